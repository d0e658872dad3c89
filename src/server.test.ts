import type { Server } from 'http';
import { buildValidatorConfig, parseEnv } from './config.js';
import { createApp, parseValidateRequest } from './server.js';
import { RequestValidationError } from './utils/errors.js';
import { createSceneValidator, type SceneValidator } from './validation/validator.js';
import { ValidationResultSchema } from './validation/types.js';

const scenes = [
  { scene_id: 'A', timestamp: 0, duration: 10, location: 'Kitchen', following_scene_id: 'B' },
  { scene_id: 'B', timestamp: 10, duration: 5, location: 'Kitchen', preceding_scene_id: 'A' },
];

async function listen(validator: SceneValidator): Promise<{ server: Server; base: string }> {
  const app = createApp(validator, { version: '9.9.9-test' });
  return new Promise(resolve => {
    const server = app.listen(0, () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({ server, base: `http://127.0.0.1:${port}` });
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

function post(base: string, path: string, body: unknown): Promise<Response> {
  return fetch(`${base}${path}`, {
    method:  'POST',
    headers: { 'content-type': 'application/json' },
    body:    typeof body === 'string' ? body : JSON.stringify(body),
  });
}

describe('parseValidateRequest', () => {
  it('accepts a well-formed request', () => {
    expect(parseValidateRequest({ project_id: 'p', scenes, validation_level: 'thorough' }))
      .toEqual({ projectId: 'p', scenes, level: 'thorough' });
  });

  it('treats a null level as absent', () => {
    expect(parseValidateRequest({ project_id: 'p', scenes, validation_level: null }).level).toBeNull();
  });

  it.each([
    [undefined, 'Missing request body'],
    [{}, 'Missing request body'],
    [[], 'Missing request body'],
    [{ scenes }, 'Missing project_id'],
    [{ project_id: '  ', scenes }, 'Missing project_id'],
    [{ project_id: 'p' }, 'No scenes provided'],
    [{ project_id: 'p', scenes: [] }, 'No scenes provided'],
    [{ project_id: 'p', scenes, validation_level: 'exhaustive' }, 'Invalid validation_level: expected one of basic, standard, thorough'],
  ])('rejects %j', (body, message) => {
    expect(() => parseValidateRequest(body)).toThrow(new RequestValidationError(message));
  });
});

describe('HTTP API', () => {
  let server: Server;
  let base: string;

  beforeAll(async () => {
    const validator = createSceneValidator({ config: buildValidatorConfig(parseEnv({}), {}) });
    ({ server, base } = await listen(validator));
  });

  afterAll(() => close(server));

  it('reports health and version', async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', version: '9.9.9-test' });
  });

  it('validates scenes and serves the stored result', async () => {
    const res = await post(base, '/validate', { project_id: 'film-1', scenes, validation_level: 'basic' });
    expect(res.status).toBe(200);

    const result = ValidationResultSchema.parse(await res.json());
    expect(result.project_id).toBe('film-1');
    expect(result.validation_status).toBe('pass');
    expect(result.summary).toEqual({ total_scenes: 2, scenes_validated: 2, total_issues: 0, critical_issues: 0 });

    const fetched = await fetch(`${base}/validation/${result.validation_id}`);
    expect(fetched.status).toBe(200);
    expect(await fetched.json()).toEqual(result);

    const listed = await fetch(`${base}/project/film-1/validations`);
    expect(await listed.json()).toEqual({ project_id: 'film-1', validations: [result] });
  });

  it('returns issues in the result body, not as an HTTP error', async () => {
    const res = await post(base, '/validate', {
      project_id: 'film-2',
      scenes:     [{ scene_id: 'A', timestamp: 0, duration: 10 }],
    });
    expect(res.status).toBe(200);
    const result = ValidationResultSchema.parse(await res.json());
    expect(result.validation_status).toBe('fail');
    expect(result.issues.map(i => i.description)).toEqual(['Missing required field: location']);
  });

  it('lists nothing for an unknown project', async () => {
    const res = await fetch(`${base}/project/nobody/validations`);
    expect(await res.json()).toEqual({ project_id: 'nobody', validations: [] });
  });

  it('rejects a request without project_id', async () => {
    const res = await post(base, '/validate', { scenes });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Missing project_id' });
  });

  it('rejects a request without scenes', async () => {
    const res = await post(base, '/validate', { project_id: 'film-1', scenes: [] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'No scenes provided' });
  });

  it('rejects an unknown validation level', async () => {
    const res = await post(base, '/validate', { project_id: 'film-1', scenes, validation_level: 'paranoid' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid validation_level: expected one of basic, standard, thorough' });
  });

  it('rejects a malformed JSON body', async () => {
    const res = await post(base, '/validate', '{"project_id": ');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Malformed JSON body' });
  });

  it('rejects an oversized body with 413', async () => {
    const res = await post(base, '/validate', { project_id: 'film-1', scenes: [{ notes: 'x'.repeat(6 * 1024 * 1024) }] });
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: 'request entity too large' });
  });

  it('rejects an unsupported charset with 415', async () => {
    const res = await fetch(`${base}/validate`, {
      method:  'POST',
      headers: { 'content-type': 'application/json; charset=latin9' },
      body:    JSON.stringify({ project_id: 'film-1', scenes }),
    });
    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({ error: 'unsupported charset "LATIN9"' });
  });

  it('returns 404 for an unknown validation id', async () => {
    const res = await fetch(`${base}/validation/does-not-exist`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Validation does-not-exist not found' });
  });

  it('returns 404 for an unsupported route', async () => {
    const res = await fetch(`${base}/scenes`, { method: 'DELETE' });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Unsupported route: DELETE /scenes' });
  });
});

describe('HTTP API failures', () => {
  it('answers 500 when the validator throws', async () => {
    const validator: SceneValidator = {
      config:                 buildValidatorConfig(parseEnv({}), {}),
      validateScenes:         () => Promise.reject(new Error('validator crashed')),
      getValidation:          async () => null,
      listProjectValidations: async () => [],
    };
    const { server, base } = await listen(validator);
    try {
      const res = await post(base, '/validate', { project_id: 'p', scenes });
      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'validator crashed' });
    } finally {
      await close(server);
    }
  });
});
