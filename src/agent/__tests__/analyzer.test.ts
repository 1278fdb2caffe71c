import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';
import { PerformanceAnalyzer } from '../analyzer';
import { ReasoningProvider } from '../reasoner';
import { AnalyticsByPlatform } from '../../models';
import { readTextDocument } from '../../outputs';
import { localDate, makeTempDir, removeDir, silentLogger } from '../../__tests__/helpers';

const now = localDate(2024, 1, 2, 10, 30);

const analytics: AnalyticsByPlatform = {
  LinkedIn: {
    platform: 'LinkedIn',
    postsCount: 2,
    totalReach: 12345,
    totalEngagements: 300,
    avgEngagementRate: (300 / 12345) * 100,
    totalClicks: 0,
    totalConversions: 0,
    ctr: 0,
    conversionRate: 0
  },
  Twitter: { platform: 'Twitter', posts: 0, totalReach: 0 },
  Instagram: {
    platform: 'Instagram',
    postsCount: 1,
    totalReach: 20000,
    totalEngagements: 900,
    avgEngagementRate: 4.5,
    totalClicks: 180,
    totalConversions: 9,
    ctr: 0.9,
    conversionRate: 5
  }
};

function fakeReasoner(analyze: ReasoningProvider['analyze']): ReasoningProvider {
  return { enabled: true, plan: async () => '', analyze };
}

describe('PerformanceAnalyzer.generatePerformanceReport', () => {
  const analyzer = new PerformanceAnalyzer({ now: () => now, logger: silentLogger() });
  const report = analyzer.generatePerformanceReport(analytics);

  it('opens with the banner and generation time', () => {
    const rule = '='.repeat(80);
    expect(report.startsWith(`\n${rule}\n📊 CAMPAIGN PERFORMANCE REPORT\n${rule}\n\nGenerated: 2024-01-02 10:30:00\n\n`)).toBe(true);
    expect(report.endsWith(`\n${rule}\n`)).toBe(true);
  });

  it('omits the conversion rate when a platform has no clicks', () => {
    const section = [
      '📱 LinkedIn',
      '-'.repeat(40),
      '  Posts:             2',
      '  Total Reach:       12,345',
      '  Engagements:       300',
      '  Engagement Rate:   2.43%',
      '  Clicks:            0',
      '  CTR:               0.00%',
      '  Conversions:       0',
      '',
      '📱 Twitter'
    ].join('\n');
    expect(report).toContain(section);
  });

  it('fills zeroes for platforms without posts', () => {
    const section = [
      '📱 Twitter',
      '-'.repeat(40),
      '  Posts:             0',
      '  Total Reach:       0',
      '  Engagements:       0',
      '  Engagement Rate:   0.00%',
      '  Clicks:            0',
      '  CTR:               0.00%',
      '  Conversions:       0',
      ''
    ].join('\n');
    expect(report).toContain(section);
  });

  it('prints the conversion rate when there were clicks', () => {
    expect(report).toContain('  CTR:               0.90%\n  Conversions:       9\n  Conv. Rate:        5.00%\n');
  });

  it('sums the overall summary', () => {
    const summary = [
      '📈 OVERALL SUMMARY',
      '-'.repeat(40),
      '  Total Reach:       32,345',
      '  Total Engagements: 1,200',
      '  Total Conversions: 9',
      '  Avg Engagement %:  3.71%',
      ''
    ].join('\n');
    expect(report).toContain(`\n\n${summary}`);
  });

  it('skips the average engagement line when nothing was reached', () => {
    const empty = analyzer.generatePerformanceReport({ LinkedIn: { platform: 'LinkedIn', posts: 0, totalReach: 0 } });
    expect(empty).toContain('  Total Conversions: 0\n');
    expect(empty).not.toContain('Avg Engagement %');
  });
});

describe('PerformanceAnalyzer.saveReport', () => {
  let dir = '';

  afterEach(() => {
    if (dir) removeDir(dir);
  });

  it('writes the text verbatim', () => {
    dir = makeTempDir();
    const logger = silentLogger();
    const analyzer = new PerformanceAnalyzer({ logger });
    const file = join(dir, 'report.txt');

    analyzer.saveReport('line one\nline two\n', file);
    expect(readTextDocument(file)).toBe('line one\nline two\n');
    expect(logger.log).toHaveBeenCalledWith(`✓ Report saved to ${file}`);
  });
});

describe('PerformanceAnalyzer.analyzeCampaignPerformance', () => {
  it('returns the basic analysis without a reasoning provider', async () => {
    const analyzer = new PerformanceAnalyzer({ now: () => now, logger: silentLogger() });
    await expect(analyzer.analyzeCampaignPerformance({ reach: 1 })).resolves.toEqual({
      analysisTimestamp: now.toISOString(),
      performanceData: { reach: 1 },
      analysisType: 'basic',
      summary: 'Campaign performance analysis generated'
    });
  });

  it('delegates to the reasoning provider when enabled', async () => {
    const reasoner = fakeReasoner(async () => 'TikTok outperformed everything');
    const analyzer = new PerformanceAnalyzer({ now: () => now, logger: silentLogger(), reasoner });

    await expect(analyzer.analyzeCampaignPerformance(analytics)).resolves.toEqual({
      analysisTimestamp: now.toISOString(),
      performanceData: analytics,
      analysisResult: 'TikTok outperformed everything'
    });
  });

  it('falls back with a warning when the provider fails', async () => {
    const logger = silentLogger();
    const reasoner = fakeReasoner(async () => {
      throw new Error('rate limited');
    });
    const analyzer = new PerformanceAnalyzer({ now: () => now, logger, reasoner });

    const result = await analyzer.analyzeCampaignPerformance(analytics);
    expect(result).toMatchObject({ analysisType: 'basic', performanceData: analytics });
    expect(logger.warn).toHaveBeenCalledWith('Warning: AI analysis failed (rate limited), using basic analysis');
  });
});

describe('PerformanceAnalyzer performance tracking', () => {
  it('stores metrics per campaign', () => {
    const analyzer = new PerformanceAnalyzer({ now: () => now, logger: silentLogger() });
    analyzer.trackPerformance('camp_1', { reach: 10 });

    expect(analyzer.getPerformanceSummary('camp_1')).toEqual({ trackedAt: now.toISOString(), metrics: { reach: 10 } });
    expect(analyzer.getPerformanceSummary('camp_2')).toEqual({});
  });
});
