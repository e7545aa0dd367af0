/**
 * Server-sent event framing
 * Encodes StreamEvents as `data:` frames and writes them to an express response
 */

import { Response } from 'express';
import { StreamEvent } from '../models/types';

type PayloadValue = string | boolean;

const NON_ASCII = /[\u007f-\uffff]/g;

/**
 * JSON-encodes a value with every code unit outside printable ASCII as a \uXXXX escape
 */
function toAsciiJson(value: PayloadValue): string {
  return JSON.stringify(value).replace(NON_ASCII, char => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

/**
 * Serializes a flat object with ": " and ", " separators,
 * e.g. {"done": true, "question": "...", "answer": "..."}
 */
function serializeFlat(entries: Array<[string, PayloadValue]>): string {
  const body = entries.map(([key, value]) => `${toAsciiJson(key)}: ${toAsciiJson(value)}`).join(', ');
  return `{${body}}`;
}

function toEntries(event: StreamEvent): Array<[string, PayloadValue]> {
  switch (event.type) {
    case 'chunk':
      return [['chunk', event.text]];
    case 'done':
      return [['done', true], ['question', event.question], ['answer', event.answer]];
    case 'error':
      return [['error', event.message]];
  }
}

/**
 * Encodes one stream event as an SSE frame: `data: <json>\n\n`
 */
export function encodeStreamEvent(event: StreamEvent): string {
  return `data: ${serializeFlat(toEntries(event))}\n\n`;
}

export class SSE {
  private res: Response;
  private initialized = false;

  constructor(res: Response) {
    this.res = res;
  }

  /**
   * Initialize the SSE stream with headers.
   */
  init(): void {
    if (this.initialized) return;

    this.res.status(200);
    this.res.setHeader('Content-Type', 'text/event-stream');
    this.res.setHeader('Cache-Control', 'no-cache');
    this.res.setHeader('Connection', 'keep-alive');
    // Disable proxy buffering (nginx)
    this.res.setHeader('X-Accel-Buffering', 'no');
    this.res.flushHeaders();

    this.initialized = true;
  }

  /**
   * Write an already encoded frame. Returns false once the client is gone.
   */
  write(frame: string): boolean {
    if (!this.initialized) this.init();
    if (this.res.writableEnded || this.res.destroyed) {
      return false;
    }
    this.res.write(frame);
    return true;
  }

  send(event: StreamEvent): boolean {
    return this.write(encodeStreamEvent(event));
  }

  /**
   * Close the SSE stream connection.
   */
  close(): void {
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }
}
