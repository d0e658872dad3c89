import { formatLine } from './logger.js';

const TS = '2026-05-01T12:00:00.000Z';

describe('formatLine', () => {
  it('writes a bracketed text line', () => {
    expect(formatLine('info', 'validator', 'Starting validation', undefined, 'text', TS))
      .toBe('[2026-05-01T12:00:00.000Z] [INFO] [validator] Starting validation');
  });

  it('appends metadata as JSON', () => {
    expect(formatLine('warn', 'db', 'Queued', { table: 'validations', rows: 2 }, 'text', TS))
      .toBe('[2026-05-01T12:00:00.000Z] [WARN] [db] Queued {"table":"validations","rows":2}');
  });

  it('serializes errors by name and message', () => {
    const line = formatLine('error', 'api', 'Failed', { err: new RangeError('too big') }, 'text', TS);
    expect(line).toBe('[2026-05-01T12:00:00.000Z] [ERROR] [api] Failed {"err":{"name":"RangeError","message":"too big"}}');
  });

  it('writes one JSON object per line in json format', () => {
    const line = formatLine('debug', 'claude', 'generate', { model: 'test-model' }, 'json', TS);
    expect(JSON.parse(line)).toEqual({
      timestamp: TS,
      level:     'debug',
      scope:     'claude',
      message:   'generate',
      model:     'test-model',
    });
  });
});
