import {
  CampaignEvent,
  ExecutionLogEntry,
  ExecutionReport,
  ExecutionResult,
  ExecutionStatus,
  Logger,
  Platform,
  PostRecord
} from '../models';
import { SocialMediaSimulator } from '../social/simulator';
import { writeJsonDocument } from '../outputs';

export interface ExecutorOptions {
  simulator?: SocialMediaSimulator;
  now?: () => Date;
  logger?: Logger;
}


export class CampaignExecutor {
  readonly simulator: SocialMediaSimulator;
  private readonly log: ExecutionLogEntry[] = [];
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(opts: ExecutorOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.simulator = opts.simulator ?? new SocialMediaSimulator({ now: this.now });
    this.logger = opts.logger ?? console;
  }

  get executionLog(): readonly ExecutionLogEntry[] {
    return this.log;
  }

  private post(campaignId: string, platform: Platform, content: string, scheduledTime: Date) {
    const record = this.simulator.postToPlatform(platform, content, scheduledTime);
    this.log.push({ campaignId, platform, executionTime: this.now(), status: 'executed' });
    return record;
  }

  // Platforms without content are skipped.
  executeCampaign(
    campaignId: string,
    platforms: readonly Platform[],
    contentPerPlatform: Readonly<Record<Platform, string>>,
    startTime?: Date
  ): ExecutionResult {
    const startedAt = this.now();
    const scheduledTime = startTime ?? startedAt;
    const posts: PostRecord[] = [];

    for (const platform of platforms) {
      const content = Object.prototype.hasOwnProperty.call(contentPerPlatform, platform) ? contentPerPlatform[platform] : '';
      if (!content) continue;
      posts.push(this.post(campaignId, platform, content, scheduledTime));
    }

    return { campaignId, startedAt, platformsTargeted: [...platforms], posts };
  }

  simulatePostExecution(event: CampaignEvent): PostRecord {
    return this.post(event.campaignId, event.platform, event.content, event.scheduledTime);
  }

  getExecutionStatus(campaignId: string): ExecutionStatus {
    const executions = this.log.filter((entry) => entry.campaignId === campaignId);
    return {
      campaignId,
      totalPlatforms: executions.length,
      executions,
      status: executions.length ? 'completed' : 'not_started'
    };
  }

  toReport(): ExecutionReport {
    return {
      export_time: this.now().toISOString(),
      total_campaigns_executed: new Set(this.log.map((entry) => entry.campaignId)).size,
      total_posts: this.simulator.history.length,
      analytics: this.simulator.getAllAnalytics(),
      execution_log: this.log.map((entry) => ({
        campaign_id: entry.campaignId,
        platform: entry.platform,
        execution_time: entry.executionTime.toISOString(),
        status: entry.status
      }))
    };
  }

  exportExecutionReport(file: string) {
    writeJsonDocument(file, this.toReport());
    this.logger.log(`✓ Execution report exported to ${file}`);
  }
}
