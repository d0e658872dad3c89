/**
 * Text-generation client for the continuity advisor — Claude via the
 * Anthropic SDK.
 *
 * One attempt per call: SDK retries are disabled so a failure surfaces
 * immediately and the advisory rule can downgrade it to a low issue.
 * Never import Anthropic directly in rules or the validator.
 */
import Anthropic from '@anthropic-ai/sdk';
import type { AdvisorConfig } from '../config.js';
import { AdvisorServiceError, AdvisorTimeoutError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('claude');

// ── Public interfaces ─────────────────────────────────────────────────────────

export interface GenerationRequest {
  /** Instruction block. */
  prompt: string;
  /** Serialized JSON context, sent as a second text block. */
  context: string;
}

export interface TextGenerator {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<string>;
}

// ── Error translation ─────────────────────────────────────────────────────────

/**
 * Maps SDK errors onto the advisor taxonomy: a status code means the service
 * answered with an error; timeouts and everything else are pipeline errors.
 */
export function toAdvisorError(err: unknown, timeoutMs: number): unknown {
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new AdvisorTimeoutError(timeoutMs, err);
  }
  if (err instanceof Anthropic.APIError && typeof err.status === 'number') {
    return new AdvisorServiceError(err.message, err.status, err);
  }
  return err;
}

// ── Generator ─────────────────────────────────────────────────────────────────

export function createClaudeGenerator(config: AdvisorConfig, apiKey: string): TextGenerator {
  const anthropic = new Anthropic({
    apiKey,
    timeout:    config.timeoutMs,
    maxRetries: 0,
  });
  const { generation } = config;

  return {
    async generate({ prompt, context }, signal) {
      log.debug('generate', { model: config.model, maxTokens: generation.maxOutputTokens });

      let res: Anthropic.Message;
      try {
        res = await anthropic.messages.create(
          {
            model:       config.model,
            max_tokens:  generation.maxOutputTokens,
            ...(generation.topP === null
              ? { temperature: generation.temperature }
              : { top_p: generation.topP }),
            top_k:       generation.topK,
            messages: [{
              role: 'user',
              content: [
                { type: 'text', text: prompt },
                { type: 'text', text: context },
              ],
            }],
          },
          { signal },
        );
      } catch (err) {
        throw toAdvisorError(err, config.timeoutMs);
      }

      const text = res.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map(block => block.text)
        .join('');

      log.debug('generate complete', {
        inputTokens:  res.usage.input_tokens,
        outputTokens: res.usage.output_tokens,
      });
      return text;
    },
  };
}
