import { asSceneKey } from '../validation/fields.js';
import type { Scene } from '../validation/types.js';
import type { RuleContext } from './types.js';

export function precedingScene({ scene, index }: RuleContext): Scene | null {
  const ref = asSceneKey(scene.preceding_scene_id);
  return ref === null ? null : index.get(ref) ?? null;
}

export function followingScene({ scene, index }: RuleContext): Scene | null {
  const ref = asSceneKey(scene.following_scene_id);
  return ref === null ? null : index.get(ref) ?? null;
}
