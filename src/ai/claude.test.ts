import Anthropic from '@anthropic-ai/sdk';
import { buildValidatorConfig, parseEnv, type AdvisorConfig } from '../config.js';
import { AdvisorServiceError, AdvisorTimeoutError } from '../utils/errors.js';
import { createClaudeGenerator, toAdvisorError } from './claude.js';

interface SdkFake {
  clients:  unknown[];
  requests: Array<{ body: Record<string, unknown>; options: { signal?: AbortSignal } }>;
  content:  unknown[];
  failWith: Error | null;
}

const sdk = vi.hoisted((): SdkFake => ({ clients: [], requests: [], content: [], failWith: null }));

// Error classes stay real so toAdvisorError sees the SDK's own types.
vi.mock('@anthropic-ai/sdk', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@anthropic-ai/sdk')>();
  const Real = actual.default;

  class FakeAnthropic {
    static APIError = Real.APIError;
    static APIConnectionError = Real.APIConnectionError;
    static APIConnectionTimeoutError = Real.APIConnectionTimeoutError;

    messages = {
      create: async (body: Record<string, unknown>, options: { signal?: AbortSignal }) => {
        sdk.requests.push({ body, options });
        if (sdk.failWith) throw sdk.failWith;
        return { content: sdk.content, usage: { input_tokens: 12, output_tokens: 34 } };
      },
    };

    constructor(clientOptions: unknown) {
      sdk.clients.push(clientOptions);
    }
  }

  return { ...actual, default: FakeAnthropic };
});

function advisorConfig(overrides: Partial<AdvisorConfig> = {}): AdvisorConfig {
  return { ...buildValidatorConfig(parseEnv({}), {}).advisor, ...overrides };
}

beforeEach(() => {
  sdk.clients = [];
  sdk.requests = [];
  sdk.content = [{ type: 'text', text: '[]' }];
  sdk.failWith = null;
});

describe('createClaudeGenerator', () => {
  it('creates a single-attempt client bounded by the advisor timeout', () => {
    createClaudeGenerator(advisorConfig({ timeoutMs: 30_000 }), 'test-secret');
    expect(sdk.clients).toEqual([{ apiKey: 'test-secret', timeout: 30_000, maxRetries: 0 }]);
  });

  it('sends the prompt and context as two text blocks with temperature sampling', async () => {
    const generator = createClaudeGenerator(advisorConfig(), 'test-secret');
    await generator.generate({ prompt: 'Review these scenes', context: '{"current_scene":{}}' });

    const body: Record<string, unknown> = sdk.requests[0]?.body ?? {};
    expect(body).toEqual({
      model:       'claude-sonnet-4-6',
      max_tokens:  1024,
      temperature: 0.2,
      top_k:       40,
      messages: [{
        role: 'user',
        content: [
          { type: 'text', text: 'Review these scenes' },
          { type: 'text', text: '{"current_scene":{}}' },
        ],
      }],
    });
    expect('top_p' in body).toBe(false);
  });

  it('sends top_p instead of temperature when configured', async () => {
    const config = advisorConfig();
    const generator = createClaudeGenerator({ ...config, generation: { ...config.generation, topP: 0.5 } }, 'test-secret');
    await generator.generate({ prompt: 'p', context: '{}' });

    const body: Record<string, unknown> = sdk.requests[0]?.body ?? {};
    expect(body['top_p']).toBe(0.5);
    expect('temperature' in body).toBe(false);
  });

  it('passes the abort signal through', async () => {
    const controller = new AbortController();
    await createClaudeGenerator(advisorConfig(), 'test-secret').generate({ prompt: 'p', context: '{}' }, controller.signal);
    expect(sdk.requests[0]?.options.signal).toBe(controller.signal);
  });

  it('joins the text blocks of the reply and skips other blocks', async () => {
    sdk.content = [
      { type: 'text', text: '[{"issue_type":' },
      { type: 'tool_use', id: 'tool-1', name: 'noop', input: {} },
      { type: 'text', text: '"timing"}]' },
    ];
    const text = await createClaudeGenerator(advisorConfig(), 'test-secret').generate({ prompt: 'p', context: '{}' });
    expect(text).toBe('[{"issue_type":"timing"}]');
  });

  it('translates a status error from the SDK', async () => {
    sdk.failWith = new Anthropic.APIError(401, undefined, 'invalid x-api-key', undefined);
    const generate = createClaudeGenerator(advisorConfig(), 'test-secret').generate({ prompt: 'p', context: '{}' });
    await expect(generate).rejects.toBeInstanceOf(AdvisorServiceError);
    await expect(generate).rejects.toMatchObject({ status: 401 });
  });

  it('translates an SDK timeout', async () => {
    sdk.failWith = new Anthropic.APIConnectionTimeoutError();
    const generate = createClaudeGenerator(advisorConfig({ timeoutMs: 7_000 }), 'test-secret')
      .generate({ prompt: 'p', context: '{}' });
    await expect(generate).rejects.toBeInstanceOf(AdvisorTimeoutError);
    await expect(generate).rejects.toThrow('Advisor request timed out after 7000ms');
  });
});

describe('toAdvisorError', () => {
  it('maps a connection timeout to an advisor timeout', () => {
    const mapped = toAdvisorError(new Anthropic.APIConnectionTimeoutError(), 5_000);
    expect(mapped).toBeInstanceOf(AdvisorTimeoutError);
    expect(mapped).toMatchObject({ timeoutMs: 5_000 });
  });

  it('maps a status response to a service error carrying the status', () => {
    const mapped = toAdvisorError(new Anthropic.APIError(529, undefined, 'Overloaded', undefined), 5_000);
    expect(mapped).toBeInstanceOf(AdvisorServiceError);
    expect(mapped).toMatchObject({ status: 529 });
  });

  it('leaves connection failures without a status alone', () => {
    const err = new Anthropic.APIConnectionError({ message: 'Connection error.' });
    expect(toAdvisorError(err, 5_000)).toBe(err);
  });

  it('leaves unrelated errors alone', () => {
    const err = new TypeError('boom');
    expect(toAdvisorError(err, 5_000)).toBe(err);
  });
});
