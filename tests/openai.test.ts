import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { analyzeDiff, buildAnalysisMessages, ConfigError, loadConfig, openaiChat, parseAnalysis } from '../src/openai';
import { vocabularyFor } from '../src/message';
import { JsonExtractionError } from '../src/utils';
import type { AppConfig } from '../src/types';

const config: AppConfig = {
  apiKey: 'test-key',
  endpoint: 'https://llm.example.test/chat/completions',
  requestTimeoutMs: 5000,
  policy: 'full',
  untracked: 'stage',
  strictInput: false,
};

const vocabulary = vocabularyFor('full');

function completion(content: string, status = 200): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('loadConfig', () => {
  it('reads credentials and applies defaults', () => {
    expect(
      loadConfig({ OPENAI_API_KEY: 'test-key', OPENAI_ENDPOINT: 'https://llm.example.test/chat/completions' })
    ).toEqual({
      apiKey: 'test-key',
      endpoint: 'https://llm.example.test/chat/completions',
      requestTimeoutMs: 60000,
      policy: 'full',
      untracked: 'stage',
      strictInput: false,
      remote: undefined,
    });
  });

  it('parses the optional settings', () => {
    const loaded = loadConfig({
      OPENAI_API_KEY: 'test-key',
      OPENAI_ENDPOINT: 'https://llm.example.test/chat/completions',
      OPENAI_TIMEOUT_MS: '1500',
      COMMIT_POLICY: 'minimal',
      COMMIT_UNTRACKED: 'ignore',
      COMMIT_STRICT_INPUT: 'true',
      COMMIT_PUSH_REMOTE: 'origin',
    });

    expect(loaded.requestTimeoutMs).toBe(1500);
    expect(loaded.policy).toBe('minimal');
    expect(loaded.untracked).toBe('ignore');
    expect(loaded.strictInput).toBe(true);
    expect(loaded.remote).toBe('origin');
  });

  it('fails fast when credentials are missing', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('OPENAI_API_KEY is not set');
    expect(() => loadConfig({ OPENAI_API_KEY: 'test-key' })).toThrow('OPENAI_ENDPOINT is not set');
  });

  it('rejects an unknown policy', () => {
    expect(() =>
      loadConfig({
        OPENAI_API_KEY: 'test-key',
        OPENAI_ENDPOINT: 'https://llm.example.test/chat/completions',
        COMMIT_POLICY: 'loose',
      })
    ).toThrow(ConfigError);
  });
});

describe('buildAnalysisMessages', () => {
  it('embeds the vocabularies, category hint and diff', () => {
    const [system, user] = buildAnalysisMessages('+ status = "okay";', 'dts', vocabulary);

    expect(system.role).toBe('system');
    expect(user.role).toBe('user');
    expect(user.content).toContain('The cpu can be: imx8mm, imx8mp, imx93\n');
    expect(user.content).toContain('The machine can be: ROM-5721, ROM-5722, ROM-2820\n');
    expect(user.content).toContain('The type can be: dts, drivers, config, kconfig, script, patch\n');
    expect(user.content).toContain('The change type for this diff is **dts**.');
    expect(user.content).toContain('The diff content is:\n\n+ status = "okay";\n');
    expect(user.content).toContain('"details": ["key_point1", "key_point2"]');
  });

  it('omits the hint without a category', () => {
    const [, user] = buildAnalysisMessages('diff', undefined, vocabulary);

    expect(user.content).not.toContain('The change type for this diff');
  });
});

describe('parseAnalysis', () => {
  it('keeps unknown values for later resolution', () => {
    const content =
      'Here is the result:\n```json\n{"cpu":"imx8mm","machine":"unknown","type":"dts","title":"Add sensor node","details":["Added node","Fixed reg"]}\n```';

    expect(parseAnalysis(content)).toEqual({
      cpu: 'imx8mm',
      machine: 'unknown',
      type: 'dts',
      title: 'Add sensor node',
      details: ['Added node', 'Fixed reg'],
    });
  });

  it('fills missing or malformed fields with empty values', () => {
    expect(parseAnalysis('{"cpu":"imx93","title":"  Tidy  ","details":"none"}')).toEqual({
      cpu: 'imx93',
      machine: '',
      type: '',
      title: 'Tidy',
      details: [],
    });
  });

  it('throws a typed error for unparsable content', () => {
    expect(() => parseAnalysis('I could not analyze this diff.')).toThrow(JsonExtractionError);
  });
});

describe('openaiChat', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the messages with the api-key header', async () => {
    const fetchMock = vi.fn(async () => completion('  hello  '));
    vi.stubGlobal('fetch', fetchMock);

    const reply = await openaiChat(config, [{ role: 'user', content: 'hi' }]);

    expect(reply).toBe('hello');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://llm.example.test/chat/completions',
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'api-key': 'test-key' },
        body: JSON.stringify({ messages: [{ role: 'user', content: 'hi' }], temperature: 0.7, max_tokens: 800 }),
      })
    );
  });

  it('throws on a non-success status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('quota exceeded', { status: 429 })));

    await expect(openaiChat(config, [])).rejects.toThrow('Completion request failed (429): quota exceeded');
  });

  it('throws when the reply has no message', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ choices: [] }), { status: 200 })));

    await expect(openaiChat(config, [])).rejects.toThrow('No message in completion response');
  });
});

describe('analyzeDiff', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('returns the parsed analysis', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        completion('{"cpu":"imx8mp","machine":"ROM-5721","type":"drivers","title":"Fix UART","details":["Baud"]}')
      )
    );

    await expect(analyzeDiff(config, 'diff', 'drivers', vocabulary)).resolves.toEqual({
      cpu: 'imx8mp',
      machine: 'ROM-5721',
      type: 'drivers',
      title: 'Fix UART',
      details: ['Baud'],
    });
  });

  it('yields null on a service error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('boom', { status: 500 })));

    await expect(analyzeDiff(config, 'diff', 'dts', vocabulary)).resolves.toBeNull();
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('yields null on unparsable content', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => completion('Sorry, no idea.')));

    await expect(analyzeDiff(config, 'diff', 'dts', vocabulary)).resolves.toBeNull();
  });

  it('yields null when the request times out', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(timeout)));

    await expect(analyzeDiff(config, 'diff', 'dts', vocabulary)).resolves.toBeNull();
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
