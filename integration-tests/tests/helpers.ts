/**
 * Test Helpers
 *
 * In-process OCR stand-ins and temporary directories.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  OcrUnavailableError,
  type OcrBlock,
  type OcrProvider,
  type RawOcrResult,
  type RecognizeOptions,
} from '@docnamer/shared';

export type StubResponse =
  | string
  | OcrBlock[]
  | Error
  | ((sourcePath: string, signal?: AbortSignal) => Promise<RawOcrResult>);

/**
 * OCR provider answering from a fixed table keyed by source path.
 */
export class StubOcrProvider implements OcrProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly responses: Record<string, StubResponse>,
    readonly engine: string = 'stub'
  ) {}

  async recognize(sourcePath: string, options: RecognizeOptions = {}): Promise<RawOcrResult> {
    this.calls.push(sourcePath);
    const response = this.responses[sourcePath];

    if (response === undefined) {
      throw new OcrUnavailableError(`No stub response for ${sourcePath}`);
    }
    if (response instanceof Error) throw response;
    if (typeof response === 'function') return response(sourcePath, options.signal);

    const blocks = typeof response === 'string' ? [{ text: response }] : response;
    return { source_path: sourcePath, engine: this.engine, blocks };
  }
}

/**
 * Response that only settles when the call is aborted.
 */
export function hangingResponse(): StubResponse {
  return (_sourcePath, signal) =>
    new Promise<RawOcrResult>((_, reject) => {
      signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
    });
}

/**
 * Response that resolves after `ms`, unless aborted first.
 */
export function delayedResponse(text: string, ms: number): StubResponse {
  return (sourcePath, signal) =>
    new Promise<RawOcrResult>((resolve, reject) => {
      const timer = setTimeout(() => resolve({ source_path: sourcePath, engine: 'stub', blocks: [{ text }] }), ms);
      signal?.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          reject(signal.reason);
        },
        { once: true }
      );
    });
}

export function makeTempDir(prefix: string = 'docnamer-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(dir: string, name: string, content: string = ''): string {
  const full = path.join(dir, name);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
  return full;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
