/**
 * Scene, issue and validation-result shapes shared by the rule set, the
 * aggregator, the store and the HTTP layer.
 */
import { z } from 'zod';

// ── Enumerations ──────────────────────────────────────────────────────────────

export const TIERS = ['basic', 'standard', 'thorough'] as const;
export const ISSUE_TYPES = ['metadata', 'continuity', 'timing', 'transition'] as const;
export const SEVERITIES = ['low', 'medium', 'high'] as const;
export const VALIDATION_STATUSES = ['pass', 'warning', 'fail'] as const;

export type Tier = (typeof TIERS)[number];
export type IssueType = (typeof ISSUE_TYPES)[number];
export type Severity = (typeof SEVERITIES)[number];
export type ValidationStatus = (typeof VALIDATION_STATUSES)[number];

// ── Scene ─────────────────────────────────────────────────────────────────────

/**
 * A scene as submitted by the caller. Every field is untrusted: the rule set
 * reports wrong or missing values as issues instead of rejecting the record.
 */
export interface Scene {
  scene_id?: unknown;
  /** Seconds from project start. */
  timestamp?: unknown;
  /** Seconds; must be > 0. */
  duration?: unknown;
  location?: unknown;
  time_of_day?: unknown;
  props?: unknown;
  preceding_scene_id?: unknown;
  following_scene_id?: unknown;
  [field: string]: unknown;
}

// ── Issue / result ────────────────────────────────────────────────────────────

export const IssueSchema = z
  .object({
    issue_id:      z.string(),
    scene_id:      z.string().nullable(),
    issue_type:    z.enum(ISSUE_TYPES),
    severity:      z.enum(SEVERITIES),
    description:   z.string(),
    suggested_fix: z.string(),
  })
  .readonly();

export const ValidationSummarySchema = z
  .object({
    total_scenes:     z.number().int().nonnegative(),
    scenes_validated: z.number().int().nonnegative(),
    total_issues:     z.number().int().nonnegative(),
    critical_issues:  z.number().int().nonnegative(),
  })
  .readonly();

export const ValidationResultSchema = z
  .object({
    project_id:        z.string(),
    validation_id:     z.string(),
    timestamp:         z.string(),
    validation_status: z.enum(VALIDATION_STATUSES),
    issues:            z.array(IssueSchema).readonly(),
    summary:           ValidationSummarySchema,
  })
  .readonly();

export type Issue = z.infer<typeof IssueSchema>;
export type ValidationSummary = z.infer<typeof ValidationSummarySchema>;
export type ValidationResult = z.infer<typeof ValidationResultSchema>;
