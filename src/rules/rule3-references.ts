/**
 * Rule 3: Reference integrity (all tiers)
 * preceding_scene_id / following_scene_id must name a scene in this run.
 */
import { createIssue } from '../validation/issues.js';
import { asSceneKey } from '../validation/fields.js';
import type { Issue } from '../validation/types.js';
import { ALL_TIERS, type SceneRule } from './types.js';

const DIRECTIONS = [
  { field: 'preceding_scene_id', label: 'preceding' },
  { field: 'following_scene_id', label: 'following' },
] as const;

export const referencesRule: SceneRule = {
  name: 'references',
  tiers: ALL_TIERS,
  check({ scene, sceneId, index }) {
    const issues: Issue[] = [];
    for (const { field, label } of DIRECTIONS) {
      const ref = asSceneKey(scene[field]);
      if (ref !== null && !index.has(ref)) {
        issues.push(createIssue(
          sceneId,
          'continuity',
          'high',
          `Referenced ${label} scene ${ref} not found`,
          'Add the missing scene or correct the reference',
        ));
      }
    }
    return issues;
  },
};
