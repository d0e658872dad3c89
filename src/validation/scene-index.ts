import { asSceneKey } from './fields.js';
import type { Scene } from './types.js';

export type SceneIndex = ReadonlyMap<string, Scene>;

/**
 * Maps scene_id to scene for one validation run. Scenes without a usable
 * scene_id are left out; on duplicate ids the later scene wins.
 */
export function buildSceneIndex(scenes: readonly Scene[]): SceneIndex {
  const index = new Map<string, Scene>();
  for (const scene of scenes) {
    const key = asSceneKey(scene.scene_id);
    if (key !== null) index.set(key, scene);
  }
  return index;
}
