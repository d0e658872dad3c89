import { v4 as uuidv4 } from 'uuid';
import type { Issue, IssueType, Severity } from './types.js';

export function createIssue(
  sceneId: string | null,
  issueType: IssueType,
  severity: Severity,
  description: string,
  suggestedFix: string,
): Issue {
  return Object.freeze({
    issue_id:      uuidv4(),
    scene_id:      sceneId,
    issue_type:    issueType,
    severity,
    description,
    suggested_fix: suggestedFix,
  });
}
