import axios from 'axios';
import { z } from 'zod';
import { ReasoningUnavailableError } from '../errors';

const OPENAI_URL = 'https://api.openai.com/v1/chat/completions';

/**
 * Optional LLM capability used by the planner and the analyzer. Callers check
 * `enabled` and must fall back to their deterministic path when a call throws.
 */
export interface ReasoningProvider {
  readonly enabled: boolean;
  plan(context: string): Promise<string>;
  analyze(data: unknown): Promise<string>;
}

export type HttpPoster = (url: string, body: unknown, headers: Record<string, string>) => Promise<{ data: unknown }>;

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).optional() }))
    .min(1)
});

const PLANNER_SYSTEM =
  'You are an expert social media campaign strategist. You understand each platform\'s audience, best practices and content requirements. Return JSON only: an object keyed by platform name whose values are the post copy for that platform.';

const ANALYST_SYSTEM =
  'You are a data-driven marketing analyst. Given per-platform campaign metrics, compare platforms, call out the best and worst performers, and give concrete recommendations for content, budget allocation and next steps.';

const axiosPoster: HttpPoster = (url, body, headers) => axios.post(url, body, { headers });


export const disabledReasoner: ReasoningProvider = {
  enabled: false,
  async plan() {
    throw new ReasoningUnavailableError();
  },
  async analyze() {
    throw new ReasoningUnavailableError();
  }
};


export class OpenAIReasoner implements ReasoningProvider {
  readonly enabled = true;

  constructor(
    private readonly apiKey: string,
    private readonly model = 'gpt-4o-mini',
    private readonly http: HttpPoster = axiosPoster
  ) {}

  private async complete(system: string, user: string) {
    const resp = await this.http(
      OPENAI_URL,
      { model: this.model, messages: [{ role: 'system', content: system }, { role: 'user', content: user }], temperature: 0.2, max_tokens: 800 },
      { Authorization: `Bearer ${this.apiKey}`, 'Content-Type': 'application/json' }
    );
    const parsed = completionSchema.safeParse(resp.data);
    const content = parsed.success ? parsed.data.choices[0].message?.content : undefined;
    if (!content) throw new Error('empty completion from reasoning provider');
    return content;
  }

  plan(context: string) {
    return this.complete(PLANNER_SYSTEM, context);
  }

  analyze(data: unknown) {
    return this.complete(ANALYST_SYSTEM, `Campaign performance data:\n${JSON.stringify(data, null, 2)}`);
  }
}


export function createReasoner(apiKey?: string, model?: string): ReasoningProvider {
  return apiKey ? new OpenAIReasoner(apiKey, model) : disabledReasoner;
}
