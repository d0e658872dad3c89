/**
 * Scene validator — builds the scene index, runs the rule set over every
 * scene in caller order, aggregates the verdict and hands the sealed result
 * to the store.
 *
 * Each call owns its index and tally; the only shared state is the frozen
 * configuration, the advisor client and the store.
 */
import { v4 as uuidv4 } from 'uuid';
import type { ContinuityAdvisor } from '../ai/advisor.js';
import type { ValidatorConfig } from '../config.js';
import { createMemoryStore, type ValidationStore } from '../db/validations.js';
import { evaluateScene } from '../rules/index.js';
import { createLogger } from '../utils/logger.js';
import { openTally, recordBatchIssue, recordScene, sealResult } from './aggregator.js';
import { asSceneKey } from './fields.js';
import { createIssue } from './issues.js';
import { buildSceneIndex } from './scene-index.js';
import type { Scene, Tier, ValidationResult } from './types.js';

const log = createLogger('validator');

export interface SceneValidatorDeps {
  config:   Readonly<ValidatorConfig>;
  advisor?: ContinuityAdvisor | null;
  store?:   ValidationStore;
}

export interface SceneValidator {
  readonly config: Readonly<ValidatorConfig>;
  validateScenes(projectId: string, scenes: readonly Scene[], level?: Tier | null): Promise<ValidationResult>;
  getValidation(validationId: string): Promise<ValidationResult | null>;
  listProjectValidations(projectId: string): Promise<ValidationResult[]>;
}

export function createSceneValidator(deps: SceneValidatorDeps): SceneValidator {
  const { config } = deps;
  const advisor = deps.advisor ?? null;
  const store = deps.store ?? createMemoryStore();

  async function persist(result: ValidationResult): Promise<void> {
    try {
      await store.save(result);
      log.info('Stored validation results', {
        validationId: result.validation_id,
        projectId:    result.project_id,
      });
    } catch (err) {
      log.error('Failed to store validation results', { validationId: result.validation_id, err });
    }
  }

  async function validateScenes(
    projectId: string,
    scenes: readonly Scene[],
    level?: Tier | null,
  ): Promise<ValidationResult> {
    const validationId = uuidv4();
    const timestamp = new Date().toISOString();
    const tier = level ?? config.defaultLevel;

    log.info('Starting validation', { validationId, projectId, scenes: scenes.length, tier });

    const tally = openTally(scenes.length);

    if (scenes.length > config.maxScenesPerBatch) {
      log.warn('Number of scenes exceeds max batch size', {
        scenes: scenes.length,
        maxScenesPerBatch: config.maxScenesPerBatch,
      });
      recordBatchIssue(tally, createIssue(
        null,
        'metadata',
        'medium',
        `Number of scenes (${scenes.length}) exceeds maximum batch size (${config.maxScenesPerBatch})`,
        'Split validation into multiple smaller batches',
      ));
    }

    const index = buildSceneIndex(scenes);
    let dropped = 0;

    for (const scene of scenes) {
      if (asSceneKey(scene.scene_id) === null && config.unkeyedScenes === 'skip') {
        dropped += 1;
        continue;
      }
      recordScene(tally, await evaluateScene(scene, index, tier, advisor));
    }

    if (dropped > 0) {
      log.warn('Skipped scenes without scene_id', { validationId, dropped });
    }

    const result = sealResult(tally, { projectId, validationId, timestamp });
    await persist(result);

    log.info('Completed validation', {
      validationId,
      status:         result.validation_status,
      totalIssues:    result.summary.total_issues,
      criticalIssues: result.summary.critical_issues,
    });
    return result;
  }

  async function getValidation(validationId: string): Promise<ValidationResult | null> {
    try {
      const result = await store.get(validationId);
      if (!result) log.warn('Validation not found', { validationId });
      return result;
    } catch (err) {
      log.error('Error retrieving validation', { validationId, err });
      return null;
    }
  }

  async function listProjectValidations(projectId: string): Promise<ValidationResult[]> {
    try {
      return await store.listByProject(projectId);
    } catch (err) {
      log.error('Error retrieving validations for project', { projectId, err });
      return [];
    }
  }

  return { config, validateScenes, getValidation, listProjectValidations };
}
