/**
 * Rule 6: Prop continuity (standard, thorough)
 * Within one location, every prop of the preceding scene should still be
 * there. One issue per missing prop, in the preceding scene's prop order.
 */
import { createIssue } from '../validation/issues.js';
import { isPresent, readProps } from '../validation/fields.js';
import { precedingScene } from './neighbours.js';
import { STANDARD_AND_UP, type SceneRule } from './types.js';

export const propsRule: SceneRule = {
  name: 'props',
  tiers: STANDARD_AND_UP,
  check(ctx) {
    const preceding = precedingScene(ctx);
    if (!preceding) return [];

    const { location } = ctx.scene;
    if (!isPresent(location) || location !== preceding.location) return [];

    const before = readProps(preceding);
    const after = readProps(ctx.scene);
    if (!before || !after) return [];

    const current = new Set(after);
    return before
      .filter(prop => !current.has(prop))
      .map(prop => createIssue(
        ctx.sceneId,
        'continuity',
        'low',
        `Prop '${prop}' present in previous scene but missing in current scene`,
        'Add the prop or justify its absence in the scene',
      ));
  },
};
