/**
 * Rule 7: External advisory review (thorough, only with a configured advisor)
 * Findings are stamped with this scene's id and fresh issue ids. Any advisor
 * failure becomes exactly one metadata/low issue; there is no retry.
 */
import { createIssue } from '../validation/issues.js';
import { AdvisorServiceError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { followingScene, precedingScene } from './neighbours.js';
import { THOROUGH_ONLY, type SceneRule } from './types.js';

const log = createLogger('advisory-rule');

export const advisoryRule: SceneRule = {
  name: 'advisory',
  tiers: THOROUGH_ONLY,
  async check(ctx) {
    const { advisor, sceneId } = ctx;
    if (!advisor) return [];

    try {
      const findings = await advisor.review({
        current_scene:   ctx.scene,
        preceding_scene: precedingScene(ctx),
        following_scene: followingScene(ctx),
      });
      return findings.map(f => createIssue(sceneId, f.issue_type, f.severity, f.description, f.suggested_fix));
    } catch (err) {
      if (err instanceof AdvisorServiceError) {
        log.error('Advisory service returned an error', { sceneId, status: err.status, err });
        return [createIssue(
          sceneId,
          'metadata',
          'low',
          `Advanced continuity review failed: the advisory service returned an error (status ${err.status})`,
          'Check advisory service access and retry',
        )];
      }
      log.error('Advisory review pipeline error', { sceneId, err });
      const message = err instanceof Error ? err.message : String(err);
      return [createIssue(
        sceneId,
        'metadata',
        'low',
        `Advanced continuity review error: ${message}`,
        'Check system logs and retry',
      )];
    }
  },
};
