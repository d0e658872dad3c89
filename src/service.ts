import { createDefaultAdvisor } from './ai/advisor.js';
import { buildValidatorConfig, env } from './config.js';
import { createValidationStore } from './db/validations.js';
import { createSceneValidator, type SceneValidator } from './validation/validator.js';

/** Wires the validator from the process environment, once at start-up. */
export function createServiceFromEnv(): SceneValidator {
  const config = buildValidatorConfig(env, process.env);
  return createSceneValidator({
    config,
    advisor: createDefaultAdvisor(config.advisor),
    store:   createValidationStore(env),
  });
}
