import { CampaignCalendar } from './calendar';
import { CampaignExecutor } from './agent/executor';
import { PerformanceAnalyzer } from './agent/analyzer';
import { CampaignPlanner } from './agent/planner';
import { disabledReasoner, ReasoningProvider } from './agent/reasoner';
import { SocialMediaSimulator } from './social/simulator';
import { timestampedPath } from './outputs';
import { truncateChars } from './text';
import {
  AnalyticsByPlatform,
  CampaignEvent,
  CampaignPlan,
  Frequency,
  Logger,
  Platform,
  PlanRequest,
  PostRecord
} from './models';

export interface OrchestratorOptions {
  outputDir: string;
  reasoner?: ReasoningProvider;
  logger?: Logger;
  now?: () => Date;
  random?: () => number;
}

export type ExecutionSummary =
  | { status: 'no_campaigns' }
  | {
      status: 'executed';
      timestamp: string;
      totalPostsExecuted: number;
      platformsCovered: Platform[];
      executions: PostRecord[];
    };

export interface WorkflowResult {
  campaignId: string;
  campaignName: string;
  workflowStatus: 'completed';
  stepsCompleted: string[];
  stats: {
    totalEventsScheduled: number;
    platformsTargeted: number;
    postsExecuted: number;
    calendarExport: string;
  };
  analyticsSummary: AnalyticsByPlatform;
  reportPreview: string;
}

const WORKFLOW_STEPS = [
  'Campaign Planning',
  'Calendar Scheduling',
  'Campaign Execution',
  'Performance Tracking',
  'Report Generation'
];


/**
 * Runs a campaign end to end: plan, schedule, execute against the simulator,
 * aggregate, report and export. Campaign plans live for the lifetime of the
 * instance only.
 */
export class CampaignOrchestrator {
  readonly calendar: CampaignCalendar;
  readonly executor: CampaignExecutor;
  readonly analyzer: PerformanceAnalyzer;
  readonly planner: CampaignPlanner;
  readonly outputDir: string;
  // start kept as epoch ms: a Date on the frozen plan can still be mutated
  private readonly campaigns = new Map<string, { plan: Readonly<CampaignPlan>; startMs: number }>();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: OrchestratorOptions) {
    const reasoner = opts.reasoner ?? disabledReasoner;
    this.logger = opts.logger ?? console;
    this.now = opts.now ?? (() => new Date());
    this.outputDir = opts.outputDir;

    const shared = { logger: this.logger, now: this.now };
    this.calendar = new CampaignCalendar(shared);
    this.executor = new CampaignExecutor({
      ...shared,
      simulator: new SocialMediaSimulator({ now: this.now, random: opts.random })
    });
    this.analyzer = new PerformanceAnalyzer({ ...shared, reasoner });
    this.planner = new CampaignPlanner({ ...shared, reasoner });
  }

  getCampaign(campaignId: string) {
    return this.campaigns.get(campaignId)?.plan;
  }

  listCampaigns() {
    return [...this.campaigns.values()].map((entry) => entry.plan);
  }

  async planCampaign(req: PlanRequest) {
    this.logger.log(`\n🎯 Planning campaign: ${req.name}`);
    this.logger.log(`   Audience: ${req.targetAudience}`);
    this.logger.log(`   Goal: ${req.goal}`);

    const plan = await this.planner.planCampaign(req);
    this.logger.log(`   Platforms: ${plan.platforms.join(', ')}`);
    this.logger.log(`   Duration: ${plan.durationDays} days`);

    this.campaigns.set(plan.campaignId, { plan, startMs: plan.startDate.getTime() });
    this.logger.log(`✓ Campaign plan created with ID: ${plan.campaignId}`);
    return plan;
  }

  scheduleCampaigns(campaignId: string, frequency: Frequency | string = 'once'): CampaignEvent[] {
    const entry = this.campaigns.get(campaignId);
    if (!entry) {
      this.logger.warn(`❌ Campaign ${campaignId} not found`);
      return [];
    }

    const campaign = entry.plan;
    this.logger.log(`\n📅 Scheduling campaign: ${campaign.name}`);
    this.logger.log(`   Frequency: ${frequency}`);
    const events = this.calendar.scheduleCampaignAcrossPlatforms(
      campaignId,
      campaign.name,
      campaign.platforms,
      campaign.content,
      new Date(entry.startMs),
      frequency
    );
    this.logger.log(`✓ Scheduled ${events.length} posts across ${campaign.platforms.length} platforms`);
    return events;
  }

  executeScheduledCampaigns(): ExecutionSummary {
    this.logger.log('\n🚀 Executing scheduled campaigns...');
    const upcoming = this.calendar.getUpcomingEvents(7);
    if (!upcoming.length) {
      this.logger.log('   No campaigns scheduled for the next 7 days');
      return { status: 'no_campaigns' };
    }

    const executions: PostRecord[] = [];
    const platformsCovered = new Set<Platform>();
    for (const event of upcoming) {
      executions.push(this.executor.simulatePostExecution(event));
      platformsCovered.add(event.platform);
      this.calendar.executeEvent(event);
    }

    this.logger.log(`✓ Executed ${executions.length} posts on ${platformsCovered.size} platforms`);
    return {
      status: 'executed',
      timestamp: this.now().toISOString(),
      totalPostsExecuted: executions.length,
      platformsCovered: [...platformsCovered],
      executions
    };
  }

  trackPerformance(): AnalyticsByPlatform {
    this.logger.log('\n📊 Tracking campaign performance...');
    return this.executor.simulator.getAllAnalytics();
  }

  generatePerformanceReport() {
    this.logger.log('\n📈 Generating performance report...');
    const report = this.analyzer.generatePerformanceReport(this.trackPerformance());
    this.analyzer.saveReport(report, timestampedPath(this.outputDir, 'performance_report', 'txt', this.now()));
    return report;
  }

  exportCalendar() {
    const file = timestampedPath(this.outputDir, 'campaign_calendar', 'json', this.now());
    this.calendar.exportCalendar(file);
    return file;
  }

  exportExecutionReport() {
    const file = timestampedPath(this.outputDir, 'execution_report', 'json', this.now());
    this.executor.exportExecutionReport(file);
    return file;
  }

  async runCompleteWorkflow(req: PlanRequest): Promise<WorkflowResult> {
    this.logger.log(`\n${'='.repeat(80)}\n🤖 CAMPAIGN PLANNER & EXECUTION PIPELINE\n${'='.repeat(80)}`);

    const plan = await this.planCampaign(req);
    const events = this.scheduleCampaigns(plan.campaignId, 'daily');
    this.logger.log(this.calendar.getCalendarView());
    const execution = this.executeScheduledCampaigns();
    const analytics = this.trackPerformance();
    this.analyzer.trackPerformance(plan.campaignId, analytics);
    const report = this.generatePerformanceReport();
    const calendarExport = this.exportCalendar();

    this.logger.log(`\n${'='.repeat(80)}\n✅ WORKFLOW COMPLETED SUCCESSFULLY\n${'='.repeat(80)}`);
    return {
      campaignId: plan.campaignId,
      campaignName: plan.name,
      workflowStatus: 'completed',
      stepsCompleted: [...WORKFLOW_STEPS],
      stats: {
        totalEventsScheduled: events.length,
        platformsTargeted: plan.platforms.length,
        postsExecuted: execution.status === 'executed' ? execution.totalPostsExecuted : 0,
        calendarExport
      },
      analyticsSummary: analytics,
      reportPreview: truncateChars(report, 500)
    };
  }
}
