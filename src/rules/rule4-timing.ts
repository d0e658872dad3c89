/**
 * Rule 4: Timing continuity (all tiers)
 * A scene should start where its preceding scene ends, within TIMING_TOLERANCE
 * seconds.
 */
import { createIssue } from '../validation/issues.js';
import { isFiniteNumber } from '../validation/fields.js';
import { precedingScene } from './neighbours.js';
import { ALL_TIERS, type SceneRule } from './types.js';

export const TIMING_TOLERANCE = 0.001;

export const timingRule: SceneRule = {
  name: 'timing',
  tiers: ALL_TIERS,
  check(ctx) {
    const preceding = precedingScene(ctx);
    if (!preceding) return [];

    const { timestamp } = ctx.scene;
    if (!isFiniteNumber(preceding.timestamp) || !isFiniteNumber(preceding.duration) || !isFiniteNumber(timestamp)) {
      return [];
    }

    const expected = preceding.timestamp + preceding.duration;
    if (Math.abs(expected - timestamp) <= TIMING_TOLERANCE) return [];

    return [createIssue(
      ctx.sceneId,
      'timing',
      'medium',
      `Timing gap between scenes: expected ${expected}, got ${timestamp}`,
      `Adjust timestamp to ${expected} or add a transition scene`,
    )];
  },
};
