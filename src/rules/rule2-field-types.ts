/**
 * Rule 2: Field types (all tiers)
 * Runs only when timestamp and duration are both present. Timestamp must be
 * numeric; duration must be numeric and strictly positive.
 */
import { createIssue } from '../validation/issues.js';
import { isFiniteNumber, isPresent } from '../validation/fields.js';
import type { Issue } from '../validation/types.js';
import { ALL_TIERS, type SceneRule } from './types.js';

export const fieldTypesRule: SceneRule = {
  name: 'field-types',
  tiers: ALL_TIERS,
  check({ scene, sceneId }) {
    const { timestamp, duration } = scene;
    if (!isPresent(timestamp) || !isPresent(duration)) return [];

    const issues: Issue[] = [];
    if (!isFiniteNumber(timestamp)) {
      issues.push(createIssue(
        sceneId,
        'metadata',
        'medium',
        'Timestamp is not a number',
        'Convert timestamp to a numeric value (seconds)',
      ));
    }
    if (!isFiniteNumber(duration) || duration <= 0) {
      issues.push(createIssue(
        sceneId,
        'metadata',
        'medium',
        'Duration is not a positive number',
        'Set duration to a positive numeric value (seconds)',
      ));
    }
    return issues;
  },
};
