import { format } from 'date-fns';
import { AnalyticsByPlatform, isAggregate, Logger, PlatformAggregate, PlatformAnalytics } from '../models';
import { writeTextDocument } from '../outputs';
import { disabledReasoner, ReasoningProvider } from './reasoner';

export interface AnalyzerOptions {
  reasoner?: ReasoningProvider;
  logger?: Logger;
  now?: () => Date;
}

export type PerformanceAnalysis<T> =
  | { analysisTimestamp: string; performanceData: T; analysisResult: string }
  | { analysisTimestamp: string; performanceData: T; analysisType: 'basic'; summary: string };

export interface TrackedPerformance {
  trackedAt: string;
  metrics: Record<string, unknown>;
}

const HEAVY_RULE = '='.repeat(80);
const LIGHT_RULE = '-'.repeat(40);

const int = (n: number) => n.toLocaleString('en-US', { maximumFractionDigits: 0 });
const pct = (n: number) => `${n.toFixed(2)}%`;

function asAggregate(data: PlatformAnalytics): PlatformAggregate {
  if (isAggregate(data)) return data;
  return {
    platform: data.platform,
    postsCount: 0,
    totalReach: data.totalReach,
    totalEngagements: 0,
    avgEngagementRate: 0,
    totalClicks: 0,
    totalConversions: 0,
    ctr: 0,
    conversionRate: 0
  };
}


export class PerformanceAnalyzer {
  private readonly reasoner: ReasoningProvider;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly tracked = new Map<string, TrackedPerformance>();

  constructor(opts: AnalyzerOptions = {}) {
    this.reasoner = opts.reasoner ?? disabledReasoner;
    this.logger = opts.logger ?? console;
    this.now = opts.now ?? (() => new Date());
  }

  async analyzeCampaignPerformance<T>(data: T): Promise<PerformanceAnalysis<T>> {
    if (this.reasoner.enabled) {
      try {
        const analysisResult = await this.reasoner.analyze(data);
        return { analysisTimestamp: this.now().toISOString(), performanceData: data, analysisResult };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Warning: AI analysis failed (${message}), using basic analysis`);
      }
    }
    return {
      analysisTimestamp: this.now().toISOString(),
      performanceData: data,
      analysisType: 'basic',
      summary: 'Campaign performance analysis generated'
    };
  }

  trackPerformance(campaignId: string, metrics: Record<string, unknown>) {
    this.tracked.set(campaignId, { trackedAt: this.now().toISOString(), metrics });
  }

  getPerformanceSummary(campaignId: string): TrackedPerformance | Record<string, never> {
    return this.tracked.get(campaignId) ?? {};
  }

  generatePerformanceReport(analytics: AnalyticsByPlatform): string {
    let report = `\n${HEAVY_RULE}\n📊 CAMPAIGN PERFORMANCE REPORT\n${HEAVY_RULE}\n\n`;
    report += `Generated: ${format(this.now(), 'yyyy-MM-dd HH:mm:ss')}\n\n`;

    let totalReach = 0;
    let totalEngagements = 0;
    let totalConversions = 0;

    for (const [platform, entry] of Object.entries(analytics)) {
      const data = asAggregate(entry);
      totalReach += data.totalReach;
      totalEngagements += data.totalEngagements;
      totalConversions += data.totalConversions;

      report += `\n📱 ${platform}\n${LIGHT_RULE}\n`;
      report += `  Posts:             ${data.postsCount}\n`;
      report += `  Total Reach:       ${int(data.totalReach)}\n`;
      report += `  Engagements:       ${int(data.totalEngagements)}\n`;
      report += `  Engagement Rate:   ${pct(data.avgEngagementRate)}\n`;
      report += `  Clicks:            ${int(data.totalClicks)}\n`;
      report += `  CTR:               ${pct(data.ctr)}\n`;
      report += `  Conversions:       ${int(data.totalConversions)}\n`;
      if (data.totalClicks > 0) report += `  Conv. Rate:        ${pct(data.conversionRate)}\n`;
    }

    report += `\n\n📈 OVERALL SUMMARY\n${LIGHT_RULE}\n`;
    report += `  Total Reach:       ${int(totalReach)}\n`;
    report += `  Total Engagements: ${int(totalEngagements)}\n`;
    report += `  Total Conversions: ${int(totalConversions)}\n`;
    if (totalReach > 0) report += `  Avg Engagement %:  ${pct((totalEngagements / totalReach) * 100)}\n`;

    report += `\n${HEAVY_RULE}\n`;
    return report;
  }

  saveReport(report: string, file: string) {
    writeTextDocument(file, report);
    this.logger.log(`✓ Report saved to ${file}`);
  }
}
