/**
 * Rule 1: Required fields (all tiers)
 * scene_id, timestamp, duration and location must be present and non-null.
 * A scene_id that cannot key the index counts as missing.
 */
import { createIssue } from '../validation/issues.js';
import { isPresent } from '../validation/fields.js';
import type { Issue } from '../validation/types.js';
import { ALL_TIERS, type SceneRule } from './types.js';

export const REQUIRED_FIELDS = ['scene_id', 'timestamp', 'duration', 'location'] as const;

export const requiredFieldsRule: SceneRule = {
  name: 'required-fields',
  tiers: ALL_TIERS,
  check({ scene, sceneId }) {
    const issues: Issue[] = [];
    for (const field of REQUIRED_FIELDS) {
      const missing = field === 'scene_id' ? sceneId === null : !isPresent(scene[field]);
      if (missing) {
        issues.push(createIssue(
          sceneId,
          'metadata',
          'high',
          `Missing required field: ${field}`,
          `Add ${field} to scene metadata`,
        ));
      }
    }
    return issues;
  },
};
