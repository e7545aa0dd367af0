/**
 * HTTPServer
 * Express server exposing the Dixer generator over JSON and server-sent events
 */

import * as http from 'http';
import { AddressInfo, Socket } from 'net';
import express, { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { AppConfig, GenerationRequest, HealthStatus, Strategy } from '../models/types';
import { SUPPORTED_MODELS, WORD_COUNT_LIMITS, isSupportedModel } from '../models/defaults';
import { isApiKeyConfigured } from './AppConfig';
import { API_KEY_MISSING_MESSAGE, IDixerStreamService, TOPIC_REQUIRED_MESSAGE } from './DixerStreamService';
import { SSE } from '../utils/sse';

export const STREAM_PATH = '/api/dixer/stream';

// Request body schema matching the generator form
const dixerRequestSchema = z.object({
  topic: z.string().default(''),
  word_count: z.coerce.number().int().optional(),
  strategy: z.string().default(Strategy.OptionA),
  member_name: z.string().nullish(),
  electorate: z.string().nullish(),
  model: z.string().nullish()
});

type ParseOutcome = { ok: true; request: GenerationRequest } | { ok: false; error: string };

export function clampWordCount(value: number | undefined): number {
  if (value === undefined) {
    return WORD_COUNT_LIMITS.default;
  }
  return Math.min(WORD_COUNT_LIMITS.max, Math.max(WORD_COUNT_LIMITS.min, value));
}

function optionalText(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Validates a request body and turns it into a GenerationRequest
 */
export function parseDixerBody(body: unknown, config: AppConfig): ParseOutcome {
  const validation = dixerRequestSchema.safeParse(body ?? {});
  if (!validation.success) {
    const details = validation.error.issues
      .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: details };
  }

  const data = validation.data;
  const model = optionalText(data.model) ?? config.defaultModel;
  if (!isSupportedModel(model)) {
    return { ok: false, error: `model: Unsupported model "${model}"` };
  }

  return {
    ok: true,
    request: {
      topic: data.topic.trim(),
      targetWordCount: clampWordCount(data.word_count),
      strategy: data.strategy.trim(),
      memberName: optionalText(data.member_name),
      electorate: optionalText(data.electorate),
      model
    }
  };
}

function statusForError(message: string | undefined): number {
  if (message === TOPIC_REQUIRED_MESSAGE) return 400;
  if (message === API_KEY_MISSING_MESSAGE) return 503;
  return 502;
}

/**
 * Aborts when the client goes away before the response is finished
 */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller;
}

/**
 * Builds the express application
 */
export function createApp(service: IDixerStreamService, config: AppConfig, startTime: number = Date.now()): Express {
  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req: Request, res: Response) => {
    const status: HealthStatus = {
      healthy: true,
      apiKeyConfigured: isApiKeyConfigured(config),
      uptime: Date.now() - startTime
    };
    res.json(status);
  });

  app.get('/api/models', (_req: Request, res: Response) => {
    res.json({ models: SUPPORTED_MODELS, defaultModel: config.defaultModel });
  });

  app.post(STREAM_PATH, async (req: Request, res: Response) => {
    const sse = new SSE(res);
    const parsed = parseDixerBody(req.body, config);
    if (!parsed.ok) {
      sse.send({ type: 'error', message: parsed.error });
      sse.close();
      return;
    }

    const controller = abortOnDisconnect(res);
    try {
      for await (const frame of service.streamSSE(parsed.request, controller.signal)) {
        if (!sse.write(frame)) {
          controller.abort();
          break;
        }
      }
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      console.error('Dixer stream route error:', errorMessage);
      sse.send({ type: 'error', message: errorMessage });
    } finally {
      sse.close();
    }
  });

  app.post('/api/dixer', async (req: Request, res: Response) => {
    const parsed = parseDixerBody(req.body, config);
    if (!parsed.ok) {
      res.status(400).json({ success: false, error: parsed.error });
      return;
    }

    const controller = abortOnDisconnect(res);
    try {
      const result = await service.generate(parsed.request, controller.signal);
      res.status(result.success ? 200 : statusForError(result.error)).json(result);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      console.error('Dixer route error:', errorMessage);
      res.status(500).json({ success: false, error: errorMessage });
    }
  });

  // Malformed JSON bodies and other middleware failures
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    console.error('Request failed:', err.message);
    if (req.path === STREAM_PATH) {
      const sse = new SSE(res);
      sse.send({ type: 'error', message: 'Invalid request body' });
      sse.close();
      return;
    }
    res.status(400).json({ success: false, error: 'Invalid request body' });
  });

  return app;
}

/**
 * Interface for HTTPServer
 */
export interface IHTTPServer {
  start(): Promise<void>;
  stop(): Promise<void>;
  isRunning(): boolean;
  address(): AddressInfo | null;
}

/**
 * HTTPServer implementation
 */
export class HTTPServer implements IHTTPServer {
  private server: http.Server | null = null;
  private connections: Set<Socket> = new Set();
  private running: boolean = false;

  constructor(
    private readonly config: AppConfig,
    private readonly service: IDixerStreamService
  ) {}

  /**
   * Starts listening on the configured host and port
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Server is already running');
    }

    const server = http.createServer(createApp(this.service, this.config));
    this.server = server;

    server.on('connection', (socket: Socket) => {
      this.connections.add(socket);
      socket.on('close', () => this.connections.delete(socket));
    });

    return new Promise((resolve, reject) => {
      server.once('error', (err) => {
        console.error('HTTP Server error:', err);
        this.server = null;
        reject(err);
      });

      server.listen(this.config.port, this.config.host, () => {
        this.running = true;
        console.log(`HTTP Server listening on ${this.config.host}:${this.config.port}`);
        resolve();
      });
    });
  }

  /**
   * Stops the server and closes all connections
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve) => {
      // Close all active connections, including open event streams
      for (const socket of this.connections) {
        socket.destroy();
      }
      this.connections.clear();

      server.close(() => {
        this.server = null;
        this.running = false;
        console.log('HTTP Server stopped');
        resolve();
      });
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }
}
