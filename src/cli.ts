import { parseArgs } from 'util';
import { createInterface } from 'readline/promises';
import type { Server } from 'http';
import { AppConfig, loadConfig } from './config';
import { CampaignOrchestrator } from './orchestrator';
import { createReasoner } from './agent/reasoner';
import { createApp } from './routes';
import { CampaignPipelineError } from './errors';
import { isAggregate, Logger, PlanRequest } from './models';
import { PLATFORMS } from './social/platforms';

export const MODES = ['demo1', 'demo2', 'interactive', 'quick', 'serve'] as const;
export type Mode = (typeof MODES)[number];

export interface CliArgs {
  mode: Mode;
  apiKey?: string;
  debug: boolean;
}

export class UsageError extends CampaignPipelineError {
  constructor(message: string) {
    super(message, 'usage', 400);
  }
}

export const DEMO_CAMPAIGNS: Record<'demo1' | 'demo2', { banner: string; request: PlanRequest }> = {
  demo1: {
    banner: 'DEMO 1: TECH PRODUCT LAUNCH CAMPAIGN',
    request: {
      name: 'AI-Powered CRM Launch',
      targetAudience: 'Enterprise SaaS buyers and IT decision makers',
      goal: 'Generate awareness and drive product demo signups',
      platforms: ['LinkedIn', 'Twitter', 'Facebook'],
      budget: '$5,000'
    }
  },
  demo2: {
    banner: 'DEMO 2: E-COMMERCE HOLIDAY CAMPAIGN',
    request: {
      name: 'Holiday Shopping Extravaganza',
      targetAudience: 'Online shoppers ages 25-55, interested in fashion and tech',
      goal: 'Maximize holiday sales and increase customer retention',
      platforms: ['Instagram', 'TikTok', 'Facebook', 'Twitter'],
      budget: '$8,000'
    }
  }
};

export function exitOnInterrupt(logger: Logger = console) {
  logger.log('\n\n❌ Campaign execution cancelled by user');
  process.exit(0);
}

function isMode(value: string): value is Mode {
  return MODES.some((m) => m === value);
}

export function parseCliArgs(argv: string[]): CliArgs {
  let values: { 'api-key'?: string; debug?: boolean };
  let positionals: string[];
  try {
    ({ values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        'api-key': { type: 'string' },
        debug: { type: 'boolean', default: false }
      }
    }));
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  const mode = positionals[0] ?? 'quick';
  if (!isMode(mode)) throw new UsageError(`Unknown mode "${mode}". Expected one of: ${MODES.join(', ')}`);
  if (positionals.length > 1) throw new UsageError(`Unexpected argument "${positionals[1]}"`);
  return { mode, apiKey: values['api-key'], debug: values.debug ?? false };
}


// Maps "1,3,4" onto the built-in platform list. Unknown numbers are ignored.
export function selectPlatforms(input: string) {
  const picked: string[] = [];
  for (const part of input.split(',')) {
    const idx = Number(part.trim());
    if (Number.isInteger(idx) && idx >= 1 && idx <= PLATFORMS.length) {
      const platform = PLATFORMS[idx - 1];
      if (!picked.includes(platform)) picked.push(platform);
    }
  }
  return picked;
}

function orchestratorFor(config: AppConfig, logger: Logger) {
  return new CampaignOrchestrator({
    outputDir: config.outputDir,
    reasoner: createReasoner(config.openaiApiKey, config.openaiModel),
    logger
  });
}

async function runDemo(which: 'demo1' | 'demo2', config: AppConfig, logger: Logger) {
  const demo = DEMO_CAMPAIGNS[which];
  logger.log(`\n${'🎬 '.repeat(20)}\n${demo.banner}\n${'🎬 '.repeat(20)}`);
  return orchestratorFor(config, logger).runCompleteWorkflow(demo.request);
}

async function runInteractive(config: AppConfig, logger: Logger) {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  // readline swallows Ctrl+C while a question is pending
  rl.on('SIGINT', () => exitOnInterrupt(logger));
  try {
    logger.log(`\n${'='.repeat(80)}\nINTERACTIVE CAMPAIGN CREATION\n${'='.repeat(80)}`);
    const name = (await rl.question('\n📝 Campaign Name: ')).trim();
    const targetAudience = (await rl.question('👥 Target Audience: ')).trim();
    const goal = (await rl.question('🎯 Campaign Goal: ')).trim();
    const budget = (await rl.question('💰 Budget: ')).trim();

    logger.log('\n📱 Available Platforms:');
    PLATFORMS.forEach((p, i) => logger.log(`  ${i + 1}. ${p}`));
    const platforms = selectPlatforms(await rl.question('\nSelect platforms (comma-separated numbers, e.g., 1,3,4): '));
    if (!platforms.length) {
      logger.error('❌ No valid platforms selected');
      return null;
    }

    return await orchestratorFor(config, logger).runCompleteWorkflow({ name, targetAudience, goal, budget, platforms });
  } finally {
    rl.close();
  }
}

// Plan, schedule, execute and report without a reasoning provider.
export async function runQuickExample(config: AppConfig, logger: Logger) {
  logger.log(`\n${'='.repeat(80)}\n⚡ QUICK EXAMPLE (No API Key Required)\n${'='.repeat(80)}`);
  const orchestrator = new CampaignOrchestrator({ outputDir: config.outputDir, logger });

  const plan = await orchestrator.planCampaign({
    name: 'Social Media Awareness Campaign',
    targetAudience: 'Tech enthusiasts and startups',
    goal: 'Build brand awareness and drive website traffic',
    platforms: ['LinkedIn', 'Twitter', 'Instagram'],
    budget: '$3,000',
    durationDays: 14
  });
  logger.log('\n📋 Campaign Plan:');
  logger.log(JSON.stringify({ name: plan.name, audience: plan.targetAudience, goal: plan.goal, platforms: plan.platforms, budget: plan.budget }, null, 2));

  const events = orchestrator.scheduleCampaigns(plan.campaignId, 'daily');
  logger.log(orchestrator.calendar.getCalendarView());

  const execution = orchestrator.executeScheduledCampaigns();
  const postsExecuted = execution.status === 'executed' ? execution.totalPostsExecuted : 0;
  logger.log(`\n✅ Executed ${postsExecuted} posts`);

  const analytics = orchestrator.trackPerformance();
  logger.log('\n📊 Performance Summary:');
  for (const [platform, data] of Object.entries(analytics)) {
    const engagements = isAggregate(data) ? data.totalEngagements : 0;
    const conversionRate = isAggregate(data) ? data.conversionRate : 0;
    logger.log(`  ${platform}:`);
    logger.log(`    - Reach: ${data.totalReach.toLocaleString('en-US')}`);
    logger.log(`    - Engagements: ${engagements.toLocaleString('en-US')}`);
    logger.log(`    - Conversion Rate: ${conversionRate.toFixed(2)}%`);
  }

  logger.log(orchestrator.generatePerformanceReport());
  const calendarExport = orchestrator.exportCalendar();
  const executionReport = orchestrator.exportExecutionReport();

  return { campaign: plan, eventsScheduled: events.length, postsExecuted, analytics, calendarExport, executionReport };
}

// Resolves once listening; a failed bind (EADDRINUSE, EACCES) rejects.
function serve(config: AppConfig, logger: Logger) {
  const app = createApp(orchestratorFor(config, logger), logger);
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.port, () => {
      server.off('error', reject);
      server.on('error', (err) => {
        logger.error(`\n❌ Error: ${err.message}`);
        process.exitCode = 1;
      });
      logger.log(`listening http://localhost:${config.port}/api/health`);
      resolve(server);
    });
    server.once('error', reject);
  });
}


/**
 * Entry point shared by `src/index.ts`. Resolves to the process exit code:
 * 0 on success or interrupt, 1 on failure, 2 on bad usage.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env, logger: Logger = console): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    logger.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
    return err instanceof UsageError ? 2 : 1;
  }

  const config = loadConfig(env, args.apiKey ? { openaiApiKey: args.apiKey } : {});
  logger.log(`\n${'🤖 '.repeat(30)}\nCAMPAIGN PLANNER & EXECUTION PIPELINE\n${'🤖 '.repeat(30)}`);

  try {
    if (args.mode === 'serve') {
      await serve(config, logger);
      return 0;
    }

    let result: unknown;
    if (args.mode === 'demo1' || args.mode === 'demo2') result = await runDemo(args.mode, config, logger);
    else if (args.mode === 'interactive') result = await runInteractive(config, logger);
    else result = await runQuickExample(config, logger);

    if (result) {
      logger.log(`\n${'='.repeat(80)}\nWORKFLOW SUMMARY\n${'='.repeat(80)}`);
      logger.log(JSON.stringify(result, null, 2));
    }
    logger.log('\n✅ Campaign execution completed successfully!');
    logger.log(`📁 Check ${config.outputDir} for generated reports and calendars`);
    return 0;
  } catch (err) {
    logger.error(`\n❌ Error: ${err instanceof Error ? err.message : String(err)}`);
    if (args.debug && err instanceof Error) logger.error(err.stack);
    return 1;
  }
}
