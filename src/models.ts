export type Platform = string;

export const FREQUENCIES = ['once', 'daily', 'weekly'] as const;

export type Frequency = (typeof FREQUENCIES)[number];

export const EVENT_STATUSES = ['Scheduled', 'Executed', 'Delayed', 'Cancelled'] as const;

export type EventStatus = (typeof EVENT_STATUSES)[number];


export interface PlatformProfile {
  baseReach: number;
  engagementRate: number;
  avgFollowers?: number;
}


export interface PlatformStrategy {
  postingFrequency: string;
  contentType: string;
  primaryKpis: readonly string[];
  goalAlignment: string;
}


export interface ContentTemplate {
  characterLimit: number;
  tone: string;
  contentTypes: string[];
  bestPostingTimes: string;
}


export interface CampaignPlan {
  campaignId: string;
  name: string;
  targetAudience: string;
  goal: string;
  platforms: readonly Platform[];
  budget: string;
  startDate: Date;
  durationDays: number;
  strategies: Readonly<Record<Platform, Readonly<PlatformStrategy>>>;
  content: Readonly<Record<Platform, string>>;
  planningResult?: string; // raw reply when a reasoning provider planned it
}


export interface PlanRequest {
  name: string;
  targetAudience: string;
  goal: string;
  platforms?: readonly Platform[];
  budget: string;
  durationDays?: number;
  startDate?: Date | string;
}


// Hash-derived numbers attached by the calendar. Not the simulator's model.
export interface CalendarExecutionMetrics {
  reach: number;
  engagement: number;
  clicks: number;
  conversions: number;
}


export interface CampaignEvent {
  campaignId: string;
  platform: Platform;
  title: string;
  content: string;
  scheduledTime: Date;
  status: EventStatus;
  performanceMetrics: CalendarExecutionMetrics | null; // set only once Executed
}


export interface SimulatedPostMetrics {
  reach: number;
  engagements: number;
  likes: number;
  comments: number;
  shares: number;
  clicks: number;
  conversions: number;
}


export interface PostRecord {
  postId: string;
  platform: Platform;
  contentPreview: string;
  postedAt: Date;
  scheduledTime: Date;
  status: 'live';
  metrics: SimulatedPostMetrics;
}


export interface ScheduledPostAck {
  platform: Platform;
  status: 'scheduled';
  contentPreview: string;
  scheduledTime: Date;
  message: string;
}


export interface EmptyPlatformAnalytics {
  platform: Platform;
  posts: 0;
  totalReach: 0;
}


export interface PlatformAggregate {
  platform: Platform;
  postsCount: number;
  totalReach: number;
  totalEngagements: number;
  avgEngagementRate: number;
  totalClicks: number;
  totalConversions: number;
  ctr: number;
  conversionRate: number;
}


export type PlatformAnalytics = EmptyPlatformAnalytics | PlatformAggregate;

export type AnalyticsByPlatform = Record<Platform, PlatformAnalytics>;

export function isAggregate(a: PlatformAnalytics): a is PlatformAggregate {
  return 'postsCount' in a;
}


export interface ExecutionLogEntry {
  campaignId: string;
  platform: Platform;
  executionTime: Date;
  status: 'executed';
}


export interface ExecutionResult {
  campaignId: string;
  startedAt: Date;
  platformsTargeted: Platform[];
  posts: PostRecord[];
}


export interface ExecutionStatus {
  campaignId: string;
  totalPlatforms: number;
  executions: ExecutionLogEntry[];
  status: 'not_started' | 'completed';
}


// --- persisted documents ------------------------------------------------------
// Field names follow the on-disk format, timestamps are ISO-8601 strings.

export interface ExportedEvent {
  campaign_id: string;
  platform: string;
  title: string;
  content: string;
  scheduled_time: string;
  status: EventStatus;
  performance_metrics: CalendarExecutionMetrics | Record<string, never>;
}


export interface CalendarExport {
  exported_at: string;
  total_campaigns: number;
  events: ExportedEvent[];
}


export interface ExecutionReport {
  export_time: string;
  total_campaigns_executed: number;
  total_posts: number;
  analytics: AnalyticsByPlatform;
  execution_log: Array<{
    campaign_id: string;
    platform: string;
    execution_time: string;
    status: 'executed';
  }>;
}


// console satisfies this; tests pass a silent one
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
