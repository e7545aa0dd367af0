/**
 * Integration tests for the HTTP surface
 *
 * Runs the express server on an ephemeral local port with a mock upstream client
 */

import * as http from 'http';
import { HTTPServer, clampWordCount, parseDixerBody } from './HTTPServer';
import { DixerStreamService } from './DixerStreamService';
import { CerebrasError, CerebrasErrorType, CompletionStreamRequest, ICerebrasClient } from './CerebrasClient';
import { AppConfig } from '../models/types';
import { encodeStreamEvent } from '../utils/sse';

/**
 * Mock CerebrasClient that replays configurable fragments
 */
class MockCerebrasClient implements ICerebrasClient {
  public fragments: string[] = [];
  public failWith: CerebrasError | null = null;
  public callLog: CompletionStreamRequest[] = [];

  async *streamCompletion(request: CompletionStreamRequest): AsyncGenerator<string> {
    this.callLog.push(request);
    for (const fragment of this.fragments) {
      yield fragment;
    }
    if (this.failWith) {
      throw this.failWith;
    }
  }

  reset(): void {
    this.fragments = [];
    this.failWith = null;
    this.callLog = [];
  }
}

/**
 * Mock CerebrasClient that sends one fragment and then waits for its signal to abort
 */
class StallingCerebrasClient implements ICerebrasClient {
  public signals: AbortSignal[] = [];
  public released: Promise<void>;
  private markReleased: () => void = () => undefined;

  constructor() {
    this.released = new Promise((resolve) => {
      this.markReleased = resolve;
    });
  }

  async *streamCompletion(
    _request: CompletionStreamRequest,
    _apiKey: string,
    signal: AbortSignal
  ): AsyncGenerator<string> {
    this.signals.push(signal);
    try {
      yield '## QUESTION\n';
      await new Promise<void>((resolve) => {
        if (signal.aborted) {
          resolve();
          return;
        }
        signal.addEventListener('abort', () => resolve(), { once: true });
      });
    } finally {
      this.markReleased();
    }
  }
}

interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

function createConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    apiKey: 'test-key',
    baseURL: null,
    defaultModel: 'gpt-oss-120b',
    streamIdleTimeoutMs: 1000,
    port: 0,
    host: '127.0.0.1',
    ...overrides
  };
}

/**
 * Sends a request to the test server and buffers the whole response
 */
function sendRequest(server: HTTPServer, method: string, path: string, body?: string): Promise<TestResponse> {
  const address = server.address();
  if (!address) {
    return Promise.reject(new Error('Server is not listening'));
  }

  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: '127.0.0.1',
        port: address.port,
        method,
        path,
        agent: false,
        headers: body !== undefined ? { 'Content-Type': 'application/json' } : {}
      },
      (res) => {
        let data = '';
        res.setEncoding('utf8');
        res.on('data', (chunk: string) => {
          data += chunk;
        });
        res.on('end', () => {
          resolve({ status: res.statusCode ?? 0, headers: res.headers, body: data });
        });
        res.on('error', reject);
      }
    );
    req.on('error', reject);
    if (body !== undefined) {
      req.write(body);
    }
    req.end();
  });
}

describe('HTTPServer', () => {
  const client = new MockCerebrasClient();
  const config = createConfig();
  const server = new HTTPServer(config, new DixerStreamService(config, client));

  beforeAll(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    await server.start();
  });

  afterAll(async () => {
    await server.stop();
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    client.reset();
  });

  it('should report running state and a bound address', () => {
    expect(server.isRunning()).toBe(true);
    expect(server.address()?.port).toBeGreaterThan(0);
  });

  it('should refuse to start twice', async () => {
    await expect(server.start()).rejects.toThrow('Server is already running');
  });

  describe('GET /health', () => {
    it('should report health and key status', async () => {
      const response = await sendRequest(server, 'GET', '/health');
      const body: unknown = JSON.parse(response.body);

      expect(response.status).toBe(200);
      expect(body).toEqual({ healthy: true, apiKeyConfigured: true, uptime: expect.any(Number) });
    });
  });

  describe('GET /api/models', () => {
    it('should list the supported models', async () => {
      const response = await sendRequest(server, 'GET', '/api/models');

      expect(response.status).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        models: [
          { id: 'gpt-oss-120b', label: 'GPT OSS 120B' },
          { id: 'llama-3.3-70b', label: 'Llama 3.3 70B' },
          { id: 'qwen-3-32b', label: 'Qwen 3 32B' }
        ],
        defaultModel: 'gpt-oss-120b'
      });
    });
  });

  describe('POST /api/dixer/stream', () => {
    it('should stream chunks followed by the parsed result', async () => {
      client.fragments = ['## QUESTION\n', 'How is it going?', '\n## ANSWER\n', 'Very well.'];

      const response = await sendRequest(
        server,
        'POST',
        '/api/dixer/stream',
        JSON.stringify({
          topic: 'tax cuts',
          word_count: 200,
          strategy: 'option_a',
          member_name: 'Jane Smith',
          electorate: 'Riverside'
        })
      );

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('text/event-stream');
      expect(response.headers['cache-control']).toBe('no-cache');
      expect(response.headers['x-accel-buffering']).toBe('no');
      expect(response.body).toBe(
        [
          'data: {"chunk": "## QUESTION\\n"}\n\n',
          'data: {"chunk": "How is it going?"}\n\n',
          'data: {"chunk": "\\n## ANSWER\\n"}\n\n',
          'data: {"chunk": "Very well."}\n\n',
          'data: {"done": true, "question": "How is it going?", "answer": "Very well."}\n\n'
        ].join('')
      );

      expect(client.callLog).toHaveLength(1);
      expect(client.callLog[0].model).toBe('gpt-oss-120b');
      expect(client.callLog[0].maxTokens).toBe(900);
    });

    it('should send a single error frame for a blank topic', async () => {
      const response = await sendRequest(server, 'POST', '/api/dixer/stream', JSON.stringify({ topic: '   ' }));

      expect(response.body).toBe('data: {"error": "Please provide a topic or announcement."}\n\n');
      expect(client.callLog).toHaveLength(0);
    });

    it('should send an upstream failure as the final frame', async () => {
      client.fragments = ['## QUESTION\n'];
      client.failWith = new CerebrasError('Invalid or unauthorized API key', CerebrasErrorType.InvalidKey, 401);

      const response = await sendRequest(server, 'POST', '/api/dixer/stream', JSON.stringify({ topic: 'housing' }));

      expect(response.body).toBe(
        encodeStreamEvent({ type: 'chunk', text: '## QUESTION\n' }) +
          'data: {"error": "Invalid or unauthorized API key"}\n\n'
      );
    });

    it('should clamp the word count before computing the token budget', async () => {
      await sendRequest(server, 'POST', '/api/dixer/stream', JSON.stringify({ topic: 'housing', word_count: 5000 }));
      await sendRequest(server, 'POST', '/api/dixer/stream', JSON.stringify({ topic: 'housing', word_count: '10' }));

      expect(client.callLog.map(request => request.maxTokens)).toEqual([1300, 700]);
    });

    it('should reject an unsupported model', async () => {
      const response = await sendRequest(
        server,
        'POST',
        '/api/dixer/stream',
        JSON.stringify({ topic: 'housing', model: 'gpt-2' })
      );

      expect(response.body).toBe('data: {"error": "model: Unsupported model \\"gpt-2\\""}\n\n');
      expect(client.callLog).toHaveLength(0);
    });

    it('should answer malformed JSON with an error frame', async () => {
      const response = await sendRequest(server, 'POST', '/api/dixer/stream', '{"topic":');

      expect(response.headers['content-type']).toBe('text/event-stream');
      expect(response.body).toBe('data: {"error": "Invalid request body"}\n\n');
    });
  });

  describe('POST /api/dixer', () => {
    it('should return the parsed result as JSON', async () => {
      client.fragments = ['## QUESTION\nWhat is new?\n', '## ANSWER\nPlenty.'];

      const response = await sendRequest(server, 'POST', '/api/dixer', JSON.stringify({ topic: 'housing' }));

      expect(response.status).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        success: true,
        question: 'What is new?',
        answer: 'Plenty.',
        raw: '## QUESTION\nWhat is new?\n## ANSWER\nPlenty.'
      });
    });

    it('should return 400 for a blank topic', async () => {
      const response = await sendRequest(server, 'POST', '/api/dixer', JSON.stringify({ topic: '' }));

      expect(response.status).toBe(400);
      expect(JSON.parse(response.body)).toEqual({
        success: false,
        error: 'Please provide a topic or announcement.'
      });
    });

    it('should return 502 when upstream fails', async () => {
      client.failWith = new CerebrasError('Rate limit exceeded', CerebrasErrorType.RateLimited, 429);

      const response = await sendRequest(server, 'POST', '/api/dixer', JSON.stringify({ topic: 'housing' }));

      expect(response.status).toBe(502);
      expect(JSON.parse(response.body)).toEqual({ success: false, error: 'Rate limit exceeded' });
    });

    it('should return 400 for malformed JSON', async () => {
      const response = await sendRequest(server, 'POST', '/api/dixer', '{bad');

      expect(response.status).toBe(400);
      expect(JSON.parse(response.body)).toEqual({ success: false, error: 'Invalid request body' });
    });
  });

  describe('without an API key', () => {
    const keylessConfig = createConfig({ apiKey: null });
    const keylessClient = new MockCerebrasClient();
    const keylessServer = new HTTPServer(keylessConfig, new DixerStreamService(keylessConfig, keylessClient));

    beforeAll(async () => {
      await keylessServer.start();
    });

    afterAll(async () => {
      await keylessServer.stop();
    });

    it('should report the key as missing', async () => {
      const response = await sendRequest(keylessServer, 'GET', '/health');
      expect(JSON.parse(response.body)).toMatchObject({ apiKeyConfigured: false });
    });

    it('should return 503 without calling upstream', async () => {
      const response = await sendRequest(keylessServer, 'POST', '/api/dixer', JSON.stringify({ topic: 'housing' }));

      expect(response.status).toBe(503);
      expect(JSON.parse(response.body)).toEqual({
        success: false,
        error: 'Cerebras API key not configured. Please set CEREBRAS_API_KEY environment variable.'
      });
      expect(keylessClient.callLog).toHaveLength(0);
    });
  });
});

describe('HTTPServer client disconnect', () => {
  const config = createConfig({ streamIdleTimeoutMs: 5000 });
  const client = new StallingCerebrasClient();
  const server = new HTTPServer(config, new DixerStreamService(config, client));

  beforeAll(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    await server.start();
  });

  afterAll(async () => {
    await server.stop();
    jest.restoreAllMocks();
  });

  it('should abort upstream when the client goes away mid-stream', async () => {
    const address = server.address();
    if (!address) {
      throw new Error('Server is not listening');
    }

    const firstFrame = await new Promise<string>((resolve, reject) => {
      const req = http.request(
        {
          host: '127.0.0.1',
          port: address.port,
          method: 'POST',
          path: '/api/dixer/stream',
          agent: false,
          headers: { 'Content-Type': 'application/json' }
        },
        (res) => {
          res.setEncoding('utf8');
          res.on('error', () => undefined);
          res.once('data', (chunk: string) => {
            resolve(chunk);
            req.destroy();
          });
        }
      );
      req.on('error', reject);
      req.end(JSON.stringify({ topic: 'housing' }));
    });

    await client.released;

    expect(firstFrame).toBe('data: {"chunk": "## QUESTION\\n"}\n\n');
    expect(client.signals).toHaveLength(1);
    expect(client.signals[0].aborted).toBe(true);
  });
});

describe('parseDixerBody', () => {
  const config = createConfig();

  it('should apply defaults and trim text fields', () => {
    expect(parseDixerBody({ topic: '  tax cuts  ', member_name: '  ', electorate: null }, config)).toEqual({
      ok: true,
      request: {
        topic: 'tax cuts',
        targetWordCount: 200,
        strategy: 'option_a',
        memberName: undefined,
        electorate: undefined,
        model: 'gpt-oss-120b'
      }
    });
  });

  it('should keep unrecognised strategies for the prompt builder to resolve', () => {
    const outcome = parseDixerBody({ topic: 'tax cuts', strategy: 'option_c' }, config);
    expect(outcome.ok && outcome.request.strategy).toBe('option_c');
  });

  it('should report field errors', () => {
    const outcome = parseDixerBody({ topic: 42 }, config);

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.error.startsWith('topic: ')).toBe(true);
  });

  it('should accept a missing body', () => {
    expect(parseDixerBody(undefined, config).ok).toBe(true);
  });
});

describe('clampWordCount', () => {
  it('should clamp to the supported range', () => {
    expect(clampWordCount(undefined)).toBe(200);
    expect(clampWordCount(50)).toBe(100);
    expect(clampWordCount(250)).toBe(250);
    expect(clampWordCount(401)).toBe(400);
  });
});
