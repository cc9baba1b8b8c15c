import { createHash } from 'crypto';
import { z } from 'zod';
import type { Decision } from '../core/types.js';
import { describe } from '../core/errors.js';
import { requestJson } from '../utils/http.js';
import { getLogger } from '../utils/logging.js';
import type { DecisionAdvisor } from './types.js';

export const FALLBACK_ACTION = 'fallback';

const SYSTEM_PROMPT =
  "You are a cookie guardian decision engine. Respond with JSON containing 'action' and 'reason' fields.";

const CompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1),
});

const DecisionSchema = z.object({
  action: z.coerce.string().default('unknown'),
  reason: z.coerce.string().default(''),
});

export interface ChatCompletionAdvisorOptions {
  apiUrl: string;
  apiKey?: string;
  model: string;
  timeoutMs?: number;
  temperature?: number;
}

/**
 * Decision advisor backed by an OpenAI-compatible chat completions endpoint.
 *
 * Never throws: a missing key or a failed call yields a `fallback` decision,
 * which the orchestrator treats as "do not proceed". Every answer, fallbacks
 * included, is cached by the SHA-256 of the prompt for the instance lifetime.
 */
export class ChatCompletionAdvisor implements DecisionAdvisor {
  private readonly cache = new Map<string, Decision>();

  constructor(private readonly opts: ChatCompletionAdvisorOptions) {}

  async decide(prompt: string): Promise<Decision> {
    const key = createHash('sha256').update(prompt, 'utf8').digest('hex');
    const cached = this.cache.get(key);
    if (cached) return cached;

    let decision: Decision;
    if (!this.opts.apiKey) {
      decision = { action: FALLBACK_ACTION, reason: 'Missing API key, using rule-based decision' };
    } else {
      try {
        decision = await this.callApi(prompt, this.opts.apiKey);
      } catch (err) {
        getLogger().warn({ err }, 'advisor call failed, using fallback decision');
        decision = { action: FALLBACK_ACTION, reason: `API call failed: ${describe(err).slice(0, 50)}` };
      }
    }
    this.cache.set(key, decision);
    return decision;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async callApi(prompt: string, apiKey: string): Promise<Decision> {
    const body = await requestJson(this.opts.apiUrl, {
      method: 'POST',
      headers: { authorization: `Bearer ${apiKey}` },
      body: {
        model: this.opts.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        temperature: this.opts.temperature ?? 0.2,
      },
      timeoutMs: this.opts.timeoutMs,
    });
    const completion = CompletionSchema.parse(body);
    const content: unknown = JSON.parse(completion.choices[0].message.content);
    return DecisionSchema.parse(content);
  }
}
