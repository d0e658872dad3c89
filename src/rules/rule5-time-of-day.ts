/**
 * Rule 5: Time of day (standard, thorough)
 * A change from the preceding scene is flagged low: it may well be intentional.
 */
import { createIssue } from '../validation/issues.js';
import { isPresent } from '../validation/fields.js';
import { precedingScene } from './neighbours.js';
import { STANDARD_AND_UP, type SceneRule } from './types.js';

export const timeOfDayRule: SceneRule = {
  name: 'time-of-day',
  tiers: STANDARD_AND_UP,
  check(ctx) {
    const preceding = precedingScene(ctx);
    if (!preceding) return [];

    const before = preceding.time_of_day;
    const after = ctx.scene.time_of_day;
    if (!isPresent(before) || !isPresent(after) || before === after) return [];

    return [createIssue(
      ctx.sceneId,
      'continuity',
      'low',
      `Time of day changed from ${String(before)} to ${String(after)}`,
      'Ensure the time change is intentional and logically explained',
    )];
  },
};
