/**
 * HTTP API
 *   GET  /health                          liveness + version
 *   POST /validate                        run a validation
 *   GET  /validation/:validationId        fetch one stored result
 *   GET  /project/:projectId/validations  list a project's results
 *
 * Malformed requests are rejected with 400 before the validator runs.
 */
import type { Server } from 'http';
import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { RequestValidationError } from './utils/errors.js';
import { createLogger } from './utils/logger.js';
import type { SceneValidator } from './validation/validator.js';
import { TIERS, type Scene, type Tier } from './validation/types.js';

const log = createLogger('api');

// ── Request parsing ───────────────────────────────────────────────────────────

const ValidateRequestSchema = z.object({
  project_id:       z.string().trim().min(1),
  scenes:           z.array(z.record(z.unknown())).min(1),
  validation_level: z.enum(TIERS).nullish(),
});

export interface ValidateRequest {
  projectId: string;
  scenes:    Scene[];
  level:     Tier | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseValidateRequest(body: unknown): ValidateRequest {
  if (!isRecord(body) || Object.keys(body).length === 0) {
    throw new RequestValidationError('Missing request body');
  }

  const parsed = ValidateRequestSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path ?? [];
    if (path[0] === 'project_id') throw new RequestValidationError('Missing project_id');
    if (path[0] === 'scenes' && path.length === 1) throw new RequestValidationError('No scenes provided');
    if (path[0] === 'validation_level') {
      throw new RequestValidationError(`Invalid validation_level: expected one of ${TIERS.join(', ')}`);
    }
    throw new RequestValidationError(`Invalid ${path.join('.')}: ${issue?.message ?? 'malformed value'}`);
  }

  return {
    projectId: parsed.data.project_id,
    scenes:    parsed.data.scenes,
    level:     parsed.data.validation_level ?? null,
  };
}

// ── App ───────────────────────────────────────────────────────────────────────

/** 4xx status carried by http-errors style errors (body-parser), else null. */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export interface AppOptions {
  version: string;
}

export function createApp(validator: SceneValidator, options: AppOptions): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status:    'healthy',
      timestamp: new Date().toISOString(),
      version:   options.version,
    });
  });

  app.post('/validate', route(async (req, res) => {
    const request = parseValidateRequest(req.body);
    log.info('Validation request', {
      projectId: request.projectId,
      scenes:    request.scenes.length,
      level:     request.level,
    });
    const result = await validator.validateScenes(request.projectId, request.scenes, request.level);
    res.json(result);
  }));

  app.get('/validation/:validationId', route(async (req, res) => {
    const { validationId } = req.params;
    const result = await validator.getValidation(validationId);
    if (!result) {
      res.status(404).json({ error: `Validation ${validationId} not found` });
      return;
    }
    res.json(result);
  }));

  app.get('/project/:projectId/validations', route(async (req, res) => {
    const { projectId } = req.params;
    const validations = await validator.listProjectValidations(projectId);
    res.json({ project_id: projectId, validations });
  }));

  app.use((req, res) => {
    res.status(404).json({ error: `Unsupported route: ${req.method} ${req.path}` });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RequestValidationError) {
      res.status(400).json({ error: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
      return;
    }
    log.error('Error processing request', { method: req.method, path: req.path, err });
    res.status(500).json({ error: err instanceof Error ? err.message : 'Internal server error' });
  });

  return app;
}

export function startServer(validator: SceneValidator, port: number, options: AppOptions): Server {
  const app = createApp(validator, options);
  return app.listen(port, () => {
    log.info(`Scene validator API listening on port ${port}`);
  });
}
