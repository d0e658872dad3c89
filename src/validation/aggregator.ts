/**
 * Aggregator — folds per-scene issue lists into summary counters and the
 * overall verdict.
 *
 * Status only ever escalates (pass → warning → fail), so the final value
 * depends on the multiset of severities and not on scene order.
 */
import type { Issue, ValidationResult, ValidationStatus, ValidationSummary } from './types.js';

const STATUS_RANK: Record<ValidationStatus, number> = { pass: 0, warning: 1, fail: 2 };

export function escalate(current: ValidationStatus, next: ValidationStatus): ValidationStatus {
  return STATUS_RANK[next] > STATUS_RANK[current] ? next : current;
}

export function statusFor(issues: readonly Issue[]): ValidationStatus {
  if (issues.some(i => i.severity === 'high')) return 'fail';
  return issues.length > 0 ? 'warning' : 'pass';
}

export interface Tally {
  status:  ValidationStatus;
  issues:  Issue[];
  summary: {
    -readonly [K in keyof ValidationSummary]: ValidationSummary[K];
  };
}

export function openTally(totalScenes: number): Tally {
  return {
    status: 'pass',
    issues: [],
    summary: {
      total_scenes:     totalScenes,
      scenes_validated: 0,
      total_issues:     0,
      critical_issues:  0,
    },
  };
}

/** Batch-level issues come before any scene's issues and force at least a warning. */
export function recordBatchIssue(tally: Tally, issue: Issue): void {
  tally.issues.push(issue);
  tally.summary.total_issues += 1;
  if (issue.severity === 'high') tally.summary.critical_issues += 1;
  tally.status = escalate(tally.status, issue.severity === 'high' ? 'fail' : 'warning');
}

export function recordScene(tally: Tally, sceneIssues: readonly Issue[]): void {
  tally.issues.push(...sceneIssues);
  tally.summary.scenes_validated += 1;
  tally.summary.total_issues += sceneIssues.length;
  tally.summary.critical_issues += sceneIssues.filter(i => i.severity === 'high').length;
  tally.status = escalate(tally.status, statusFor(sceneIssues));
}

export function sealResult(
  tally: Tally,
  meta: { projectId: string; validationId: string; timestamp: string },
): ValidationResult {
  return Object.freeze({
    project_id:        meta.projectId,
    validation_id:     meta.validationId,
    timestamp:         meta.timestamp,
    validation_status: tally.status,
    issues:            Object.freeze([...tally.issues]),
    summary:           Object.freeze({ ...tally.summary }),
  });
}
