/**
 * Typed errors for the pipeline. Each carries a stable `code` that the HTTP
 * layer reports back and `status` it maps to.
 */
export class CampaignPipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number = 500
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidTimestampError extends CampaignPipelineError {
  constructor(value: string) {
    super(`Invalid ISO-8601 timestamp: ${value}`, 'invalid-timestamp', 400);
  }
}

export class InvalidFrequencyError extends CampaignPipelineError {
  constructor(value: string) {
    super(`Unknown frequency: ${value} (expected once, daily or weekly)`, 'invalid-frequency', 400);
  }
}

export class CalendarImportError extends CampaignPipelineError {
  constructor(path: string, detail: string) {
    super(`Cannot import calendar from ${path}: ${detail}`, 'calendar-import-failed', 400);
  }
}

export class ReasoningUnavailableError extends CampaignPipelineError {
  constructor(reason = 'no reasoning provider configured') {
    super(reason, 'reasoning-unavailable', 503);
  }
}
