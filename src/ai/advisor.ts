/**
 * External continuity advisor.
 *
 * Sends a scene and its immediate neighbours to a text-generation service and
 * parses the reply as a JSON array of issue-shaped findings. Entries whose
 * issue_type or severity fall outside the known values are discarded.
 *
 * Callers get either findings or a thrown error; turning errors into issues is
 * the advisory rule's job.
 */
import { z } from 'zod';
import type { AdvisorConfig } from '../config.js';
import { AdvisorResponseError, AdvisorTimeoutError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { ISSUE_TYPES, SEVERITIES, type IssueType, type Scene, type Severity } from '../validation/types.js';
import { createClaudeGenerator, type TextGenerator } from './claude.js';

const log = createLogger('advisor');

// ── Types ─────────────────────────────────────────────────────────────────────

export interface AdvisorContext {
  current_scene:   Scene;
  preceding_scene: Scene | null;
  following_scene: Scene | null;
}

export interface AdvisorFinding {
  issue_type:    IssueType;
  severity:      Severity;
  description:   string;
  suggested_fix: string;
}

export interface ContinuityAdvisor {
  review(context: AdvisorContext): Promise<AdvisorFinding[]>;
}

// ── Prompt ────────────────────────────────────────────────────────────────────

export const CONTINUITY_PROMPT =
  `Analyze the continuity and logical flow between these scenes in a film/video project.\n` +
  `Identify any potential continuity issues, logical inconsistencies, or narrative problems.\n` +
  `Format your response as a JSON array of issues, where each issue has:\n` +
  `- issue_type: "continuity", "transition", "timing", or "metadata"\n` +
  `- severity: "low", "medium", or "high"\n` +
  `- description: A clear explanation of the issue\n` +
  `- suggested_fix: A practical suggestion to address the issue\n\n` +
  `Only identify actual issues, not hypothetical ones. If no issues are found, return an empty array.\n` +
  `Respond with the JSON array only (no markdown, no explanation).`;

// ── Response parsing ──────────────────────────────────────────────────────────

const FindingSchema = z.object({
  issue_type:    z.enum(ISSUE_TYPES),
  severity:      z.enum(SEVERITIES),
  description:   z.string().trim().min(1),
  suggested_fix: z.string().default(''),
});

export function parseFindings(text: string): AdvisorFinding[] {
  const clean = text.replace(/```(?:json)?/g, '').trim();
  const start = clean.indexOf('[');
  const end = clean.lastIndexOf(']');
  if (start === -1 || end < start) {
    throw new AdvisorResponseError('Advisor response contains no JSON array', text);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(clean.slice(start, end + 1));
  } catch {
    throw new AdvisorResponseError('Advisor response is not valid JSON', text);
  }
  if (!Array.isArray(raw)) {
    throw new AdvisorResponseError('Advisor response is not a JSON array', text);
  }

  const findings: AdvisorFinding[] = [];
  for (const entry of raw) {
    const parsed = FindingSchema.safeParse(entry);
    if (parsed.success) findings.push(parsed.data);
  }
  if (findings.length < raw.length) {
    log.warn('Discarded malformed advisor findings', { received: raw.length, kept: findings.length });
  }
  return findings;
}

// ── Advisor ───────────────────────────────────────────────────────────────────

async function withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new AdvisorTimeoutError(timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

export function createContinuityAdvisor(generator: TextGenerator, config: AdvisorConfig): ContinuityAdvisor {
  return {
    async review(context) {
      const request = {
        prompt:  CONTINUITY_PROMPT,
        context: JSON.stringify(context, null, 2),
      };
      const text = await withTimeout(signal => generator.generate(request, signal), config.timeoutMs);
      return parseFindings(text);
    },
  };
}

/** Claude-backed advisor, or null when no credential is configured. */
export function createDefaultAdvisor(config: AdvisorConfig): ContinuityAdvisor | null {
  if (!config.apiKey) {
    log.info('No advisor credential configured — thorough tier runs without advisory review');
    return null;
  }
  return createContinuityAdvisor(createClaudeGenerator(config, config.apiKey), config);
}
