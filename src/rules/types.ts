import type { ContinuityAdvisor } from '../ai/advisor.js';
import type { SceneIndex } from '../validation/scene-index.js';
import type { Issue, Scene, Tier } from '../validation/types.js';

export interface RuleContext {
  scene:   Scene;
  /** Null when the scene carries no usable scene_id. */
  sceneId: string | null;
  index:   SceneIndex;
  tier:    Tier;
  advisor: ContinuityAdvisor | null;
}

export interface SceneRule {
  name:  string;
  tiers: readonly Tier[];
  check(ctx: RuleContext): Issue[] | Promise<Issue[]>;
}

export const ALL_TIERS: readonly Tier[] = ['basic', 'standard', 'thorough'];
export const STANDARD_AND_UP: readonly Tier[] = ['standard', 'thorough'];
export const THOROUGH_ONLY: readonly Tier[] = ['thorough'];
