import crypto from 'crypto';
import { addDays, addWeeks, format, isValid, parseISO } from 'date-fns';
import { z } from 'zod';
import {
  CalendarExecutionMetrics,
  CalendarExport,
  CampaignEvent,
  EVENT_STATUSES,
  ExportedEvent,
  FREQUENCIES,
  Frequency,
  Logger,
  Platform
} from './models';
import { CalendarImportError, InvalidFrequencyError, InvalidTimestampError } from './errors';
import { readJsonDocument, writeJsonDocument } from './outputs';
import { padChars, truncateChars } from './text';

export interface CalendarOptions {
  now?: () => Date;
  logger?: Logger;
}

const metricsSchema = z.object({
  reach: z.number(),
  engagement: z.number(),
  clicks: z.number(),
  conversions: z.number()
});

const exportSchema = z.object({
  exported_at: z.string(),
  total_campaigns: z.number().int().nonnegative(),
  events: z.array(
    z.object({
      campaign_id: z.string(),
      platform: z.string(),
      title: z.string(),
      content: z.string(),
      scheduled_time: z.string(),
      status: z.enum(EVENT_STATUSES),
      performance_metrics: z.union([metricsSchema, z.object({}).strict()])
    })
  )
});


export function toTimestamp(value: Date | string): Date {
  const date = typeof value === 'string' ? parseISO(value) : value;
  if (!isValid(date)) throw new InvalidTimestampError(String(value));
  return date;
}

export function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some((f) => f === value);
}

// Unsigned 32-bit digest of the id; stable across runs.
export function campaignHash(campaignId: string) {
  return crypto.createHash('sha256').update(campaignId).digest().readUInt32BE(0);
}

export function calendarExecutionMetrics(campaignId: string): CalendarExecutionMetrics {
  const h = campaignHash(campaignId);
  return {
    reach: 5000 + (h % 10000),
    engagement: 250 + (h % 1000),
    clicks: 50 + (h % 500),
    conversions: 5 + (h % 50)
  };
}

function byScheduledTime(a: CampaignEvent, b: CampaignEvent) {
  return a.scheduledTime.getTime() - b.scheduledTime.getTime();
}


export class CampaignCalendar {
  private readonly list: CampaignEvent[] = [];
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(opts: CalendarOptions = {}) {
    this.now = opts.now ?? (() => new Date());
    this.logger = opts.logger ?? console;
  }

  static fromExport(file: string, opts: CalendarOptions = {}) {
    const calendar = new CampaignCalendar(opts);
    calendar.importCalendar(file);
    return calendar;
  }

  get events(): readonly CampaignEvent[] {
    return this.list;
  }

  addEvent(event: CampaignEvent) {
    this.list.push(event);
    this.logger.log(`✓ Added ${event.platform} campaign: ${event.title} on ${event.scheduledTime.toISOString()}`);
  }

  scheduleCampaignAcrossPlatforms(
    campaignId: string,
    title: string,
    platforms: readonly Platform[],
    contentPerPlatform: Readonly<Record<Platform, string>>,
    startDate: Date | string,
    frequency: Frequency | string = 'once'
  ): CampaignEvent[] {
    if (!isFrequency(frequency)) throw new InvalidFrequencyError(frequency);
    const start = toTimestamp(startDate);

    // [id suffix, title suffix, time] per occurrence
    const occurrences: Array<[string, string, Date]> = [];
    if (frequency === 'once') {
      occurrences.push(['', '', start]);
    } else if (frequency === 'daily') {
      for (let i = 0; i < 7; i++) occurrences.push([`_day${i + 1}`, ` - Day ${i + 1}`, addDays(start, i)]);
    } else {
      for (let i = 0; i < 4; i++) occurrences.push([`_week${i + 1}`, ` - Week ${i + 1}`, addWeeks(start, i)]);
    }

    const created: CampaignEvent[] = [];
    for (const platform of platforms) {
      const content = Object.prototype.hasOwnProperty.call(contentPerPlatform, platform) ? contentPerPlatform[platform] : '';
      for (const [idSuffix, titleSuffix, scheduledTime] of occurrences) {
        const event: CampaignEvent = {
          campaignId: `${campaignId}${idSuffix}`,
          platform,
          title: `${title}${titleSuffix}`,
          content,
          scheduledTime,
          status: 'Scheduled',
          performanceMetrics: null
        };
        this.addEvent(event);
        created.push(event);
      }
    }
    return created;
  }

  getUpcomingEvents(days = 7): CampaignEvent[] {
    const now = this.now();
    return this.eventsBetween(now, addDays(now, days));
  }

  private eventsBetween(start: Date, end: Date) {
    const from = start.getTime();
    const to = end.getTime();
    return this.list
      .filter((e) => {
        const t = e.scheduledTime.getTime();
        return t >= from && t <= to;
      })
      .sort(byScheduledTime);
  }

  executeEvent(event: CampaignEvent) {
    event.status = 'Executed';
    event.performanceMetrics = calendarExecutionMetrics(event.campaignId);
    this.logger.log(`✓ Executed ${event.platform} campaign: ${event.title}`);
  }

  getCalendarView(startDate?: Date | string, days = 7): string {
    const start = startDate === undefined ? this.now() : toTimestamp(startDate);
    const end = addDays(start, days);

    let view = `\n📅 Campaign Calendar (${format(start, 'yyyy-MM-dd')} to ${format(end, 'yyyy-MM-dd')})\n`;
    view += '='.repeat(80) + '\n';
    for (const event of this.eventsBetween(start, end)) {
      const when = format(event.scheduledTime, 'yyyy-MM-dd HH:mm');
      view += `${when} | ${event.platform.padEnd(10)} | ${padChars(truncateChars(event.title, 40), 40)} | ${event.status}\n`;
    }
    return view;
  }

  toExport(): CalendarExport {
    return {
      exported_at: this.now().toISOString(),
      total_campaigns: this.list.length,
      events: this.list.map(
        (e): ExportedEvent => ({
          campaign_id: e.campaignId,
          platform: e.platform,
          title: e.title,
          content: e.content,
          scheduled_time: e.scheduledTime.toISOString(),
          status: e.status,
          performance_metrics: e.performanceMetrics ? { ...e.performanceMetrics } : {}
        })
      )
    };
  }

  exportCalendar(file: string) {
    writeJsonDocument(file, this.toExport());
    this.logger.log(`✓ Calendar exported to ${file}`);
  }

  // Appends the events of a previous export, statuses and metrics included.
  importCalendar(file: string): CampaignEvent[] {
    let raw: unknown;
    try {
      raw = readJsonDocument(file);
    } catch (err) {
      throw new CalendarImportError(file, err instanceof Error ? err.message : String(err));
    }
    if (raw === null) throw new CalendarImportError(file, 'file not found');

    const parsed = exportSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CalendarImportError(file, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }

    const imported = parsed.data.events.map((e, idx): CampaignEvent => {
      const scheduledTime = parseISO(e.scheduled_time);
      if (!isValid(scheduledTime)) throw new CalendarImportError(file, `events.${idx}.scheduled_time is not ISO-8601`);
      const full = metricsSchema.safeParse(e.performance_metrics);
      const metrics = full.success ? full.data : null;
      if ((metrics !== null) !== (e.status === 'Executed')) {
        throw new CalendarImportError(file, `events.${idx} has metrics inconsistent with status ${e.status}`);
      }
      return {
        campaignId: e.campaign_id,
        platform: e.platform,
        title: e.title,
        content: e.content,
        scheduledTime,
        status: e.status,
        performanceMetrics: metrics
      };
    });

    this.list.push(...imported);
    return imported;
  }

  getPlatformSummary(): Record<Platform, number> {
    const summary: Record<Platform, number> = {};
    for (const event of this.list) {
      summary[event.platform] = (summary[event.platform] ?? 0) + 1;
    }
    return summary;
  }
}
