/**
 * Rule runner — applies the fixed rule list to one scene, in order, skipping
 * rules outside the requested tier. Rules are independent: a scene collects
 * every issue each rule reports.
 */
import type { ContinuityAdvisor } from '../ai/advisor.js';
import { asSceneKey } from '../validation/fields.js';
import type { SceneIndex } from '../validation/scene-index.js';
import type { Issue, Scene, Tier } from '../validation/types.js';
import { requiredFieldsRule } from './rule1-required-fields.js';
import { fieldTypesRule } from './rule2-field-types.js';
import { referencesRule } from './rule3-references.js';
import { timingRule } from './rule4-timing.js';
import { timeOfDayRule } from './rule5-time-of-day.js';
import { propsRule } from './rule6-props.js';
import { advisoryRule } from './rule7-advisory.js';
import type { RuleContext, SceneRule } from './types.js';

export {
  requiredFieldsRule,
  fieldTypesRule,
  referencesRule,
  timingRule,
  timeOfDayRule,
  propsRule,
  advisoryRule,
};

export type { RuleContext, SceneRule };

export const RULES: readonly SceneRule[] = [
  requiredFieldsRule,
  fieldTypesRule,
  referencesRule,
  timingRule,
  timeOfDayRule,
  propsRule,
  advisoryRule,
];

export async function evaluateScene(
  scene: Scene,
  index: SceneIndex,
  tier: Tier,
  advisor: ContinuityAdvisor | null = null,
): Promise<Issue[]> {
  const ctx: RuleContext = {
    scene,
    sceneId: asSceneKey(scene.scene_id),
    index,
    tier,
    advisor,
  };

  const issues: Issue[] = [];
  for (const rule of RULES) {
    if (!rule.tiers.includes(tier)) continue;
    issues.push(...await rule.check(ctx));
  }
  return issues;
}
