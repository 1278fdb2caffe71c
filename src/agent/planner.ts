import { nanoid } from 'nanoid';
import { CampaignPlan, Logger, Platform, PlanRequest, PlatformStrategy } from '../models';
import { toTimestamp } from '../calendar';
import { generatePlatformContent, getPlatformStrategy, PLATFORMS } from '../social/platforms';
import { disabledReasoner, ReasoningProvider } from './reasoner';

export interface PlannerOptions {
  reasoner?: ReasoningProvider;
  logger?: Logger;
  now?: () => Date;
}

const DEFAULT_DURATION_DAYS = 28;


export function validatePlanRequest(req: Partial<PlanRequest>) {
  const errors: string[] = [];
  if (!req.name || req.name.trim().length === 0) errors.push('name-empty');
  if (!req.targetAudience || req.targetAudience.trim().length === 0) errors.push('audience-empty');
  if (!req.goal || req.goal.trim().length === 0) errors.push('goal-empty');
  if (req.platforms && req.platforms.length === 0) errors.push('platforms-empty');
  if (req.durationDays !== undefined && (!Number.isInteger(req.durationDays) || req.durationDays <= 0)) {
    errors.push('duration-invalid');
  }
  return Array.from(new Set(errors));
}


// Pulls the outermost {...} out of a model reply. Falls back to wrapping the raw text.
export function parseCampaignPlan(text: string): Record<string, unknown> {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    try {
      const parsed: unknown = JSON.parse(text.slice(start, end + 1));
      if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
    } catch {
      // not JSON; use the fallback shape below
    }
  }
  return { strategy: text, platforms: [...PLATFORMS] };
}


export class CampaignPlanner {
  private readonly reasoner: ReasoningProvider;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: PlannerOptions = {}) {
    this.reasoner = opts.reasoner ?? disabledReasoner;
    this.logger = opts.logger ?? console;
    this.now = opts.now ?? (() => new Date());
  }

  async planCampaign(req: PlanRequest): Promise<Readonly<CampaignPlan>> {
    const created = this.now();
    const platforms = req.platforms?.length ? [...req.platforms] : [...PLATFORMS];
    const strategies = this.buildStrategies(platforms, req.goal);
    const content = this.buildContent(platforms, req.name, req.targetAudience);
    const plan: CampaignPlan = {
      campaignId: `camp_${created.getTime()}_${nanoid(6)}`,
      name: req.name,
      targetAudience: req.targetAudience,
      goal: req.goal,
      platforms,
      budget: req.budget,
      startDate: req.startDate === undefined ? created : toTimestamp(req.startDate),
      durationDays: req.durationDays ?? DEFAULT_DURATION_DAYS,
      strategies,
      content
    };

    if (this.reasoner.enabled) {
      try {
        const reply = await this.reasoner.plan(this.planningContext(plan));
        plan.planningResult = reply;
        const suggested = parseCampaignPlan(reply);
        for (const platform of platforms) {
          const copy = suggested[platform];
          if (typeof copy === 'string' && copy.trim()) content[platform] = copy.trim();
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Warning: AI planning failed (${message}), using basic planning`);
      }
    }

    // nested collections too
    for (const strategy of Object.values(strategies)) {
      Object.freeze(strategy.primaryKpis);
      Object.freeze(strategy);
    }
    Object.freeze(strategies);
    Object.freeze(content);
    Object.freeze(platforms);
    return Object.freeze(plan);
  }

  private buildStrategies(platforms: readonly Platform[], goal: string) {
    const strategies: Record<Platform, PlatformStrategy> = {};
    for (const platform of platforms) strategies[platform] = getPlatformStrategy(platform, goal);
    return strategies;
  }

  private buildContent(platforms: readonly Platform[], name: string, audience: string) {
    const content: Record<Platform, string> = {};
    for (const platform of platforms) {
      const copy = generatePlatformContent(platform, name, audience);
      if (copy !== undefined) content[platform] = copy;
    }
    return content;
  }

  private planningContext(plan: CampaignPlan) {
    return [
      `Campaign Name: ${plan.name}`,
      `Target Audience: ${plan.targetAudience}`,
      `Campaign Goal: ${plan.goal}`,
      `Budget: ${plan.budget}`,
      `Duration: ${plan.durationDays} days`,
      `Platforms: ${plan.platforms.join(', ')}`,
      '',
      'For each platform write one post tailored to its native format and audience, with 3-5 hashtags and a call to action.'
    ].join('\n');
  }
}
