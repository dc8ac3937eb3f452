/**
 * OCR Providers
 *
 * The pipeline only sees the OcrProvider interface. These variants cover the
 * degraded text source (plain .txt, no confidences), primary/fallback
 * chaining, routing by file extension, and the per-call timeout.
 */

import fs from 'fs/promises';
import path from 'path';
import type { OcrBlock, OcrProvider, RawOcrResult, RecognizeOptions } from './types';
import { BatchAbortedError, OcrTimeoutError, OcrUnavailableError } from './errors';
import { extensionOf } from './naming';
import { logger } from './logger';

function hasText(result: RawOcrResult): boolean {
  return wellFormedBlocks(result.blocks).some((block) => block.text.trim().length > 0);
}

function toBlock(value: unknown): OcrBlock | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!('text' in value) || typeof value.text !== 'string') return null;

  const block: OcrBlock = { text: value.text };
  if ('confidence' in value && typeof value.confidence === 'number') block.confidence = value.confidence;
  if ('page' in value && typeof value.page === 'number') block.page = value.page;
  return block;
}

/** Blocks with a text string; anything else a provider returned is dropped. */
function wellFormedBlocks(blocks: unknown): OcrBlock[] {
  if (!Array.isArray(blocks)) return [];
  const kept: OcrBlock[] = [];
  for (const value of blocks) {
    const block = toBlock(value);
    if (block) kept.push(block);
  }
  return kept;
}

export function freezeOcrResult(result: RawOcrResult): RawOcrResult {
  return Object.freeze({
    source_path: result.source_path,
    engine: result.engine,
    blocks: Object.freeze(wellFormedBlocks(result.blocks).map((block) => Object.freeze(block))),
  });
}

/**
 * Split plain text into one block per non-empty line.
 */
export function linesToBlocks(text: string, page?: number): OcrBlock[] {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .map((line) => (page === undefined ? { text: line } : { text: line, page }));
}

/**
 * Reads plain text: the file itself when it is a .txt, otherwise a sidecar
 * .txt with the same base name (scan.pdf → scan.txt). No confidences.
 */
export class PlainTextOcrProvider implements OcrProvider {
  readonly engine = 'plain-text';

  static textPathFor(sourcePath: string): string {
    if (extensionOf(sourcePath) === '.txt') return sourcePath;
    const parsed = path.parse(sourcePath);
    return path.join(parsed.dir, `${parsed.name}.txt`);
  }

  async recognize(sourcePath: string, options: RecognizeOptions = {}): Promise<RawOcrResult> {
    const textPath = PlainTextOcrProvider.textPathFor(sourcePath);

    let text: string;
    try {
      text = await fs.readFile(textPath, { encoding: 'utf-8', signal: options.signal });
    } catch (error) {
      if (options.signal?.aborted) throw error;
      throw new OcrUnavailableError(`No text source for ${sourcePath}`, {
        text_path: textPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return freezeOcrResult({ source_path: sourcePath, engine: this.engine, blocks: linesToBlocks(text) });
  }
}

/**
 * Tries the primary provider; uses the fallback when the primary is
 * unavailable or finds no text.
 */
export class FallbackOcrProvider implements OcrProvider {
  readonly engine: string;

  constructor(
    private readonly primary: OcrProvider,
    private readonly fallback: OcrProvider
  ) {
    this.engine = `${primary.engine}>${fallback.engine}`;
  }

  async recognize(sourcePath: string, options: RecognizeOptions = {}): Promise<RawOcrResult> {
    let primaryResult: RawOcrResult | null = null;

    try {
      primaryResult = await this.primary.recognize(sourcePath, options);
      if (hasText(primaryResult)) return primaryResult;
      logger.debug('Primary OCR found no text, trying fallback', {
        source_path: sourcePath,
        primary: this.primary.engine,
      });
    } catch (error) {
      if (options.signal?.aborted || error instanceof OcrTimeoutError) throw error;
      logger.warn('Primary OCR unavailable, trying fallback', {
        source_path: sourcePath,
        primary: this.primary.engine,
        fallback: this.fallback.engine,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    try {
      const fallbackResult = await this.fallback.recognize(sourcePath, options);
      return primaryResult && !hasText(fallbackResult) ? primaryResult : fallbackResult;
    } catch (error) {
      // An empty primary result is still an answer
      if (primaryResult && error instanceof OcrUnavailableError) return primaryResult;
      throw error;
    }
  }
}

/**
 * Picks a provider by file extension (".pdf", ".png", ...).
 */
export class RoutingOcrProvider implements OcrProvider {
  readonly engine = 'routing';
  private readonly routes: ReadonlyMap<string, OcrProvider>;

  constructor(
    routes: Record<string, OcrProvider>,
    private readonly defaultProvider?: OcrProvider
  ) {
    this.routes = new Map(
      Object.entries(routes).map(([ext, provider]) => [ext.startsWith('.') ? ext.toLowerCase() : `.${ext.toLowerCase()}`, provider])
    );
  }

  providerFor(sourcePath: string): OcrProvider | undefined {
    return this.routes.get(extensionOf(sourcePath)) ?? this.defaultProvider;
  }

  async recognize(sourcePath: string, options: RecognizeOptions = {}): Promise<RawOcrResult> {
    const provider = this.providerFor(sourcePath);
    if (!provider) {
      throw new OcrUnavailableError(`No OCR provider for ${extensionOf(sourcePath) || 'files without extension'}`, {
        source_path: sourcePath,
      });
    }
    return provider.recognize(sourcePath, options);
  }
}

export interface TimeoutOptions {
  timeoutMs: number;
  /** Batch-level cancellation */
  signal?: AbortSignal;
}

/**
 * Run one OCR call under its own deadline. The provider gets a signal that
 * fires on timeout or batch cancellation; the call settles as soon as
 * either happens, even if the provider ignores the signal.
 */
export async function recognizeWithTimeout(
  provider: OcrProvider,
  sourcePath: string,
  options: TimeoutOptions
): Promise<RawOcrResult> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new OcrTimeoutError(options.timeoutMs, { source_path: sourcePath, engine: provider.engine });
      controller.abort(error);
      reject(error);
    }, options.timeoutMs);

    const { signal } = options;
    if (signal) {
      onAbort = () => {
        const error =
          signal.reason instanceof BatchAbortedError
            ? signal.reason
            : new BatchAbortedError(
                signal.reason instanceof Error ? signal.reason.message : String(signal.reason ?? 'cancelled')
              );
        controller.abort(error);
        reject(error);
      };
      if (signal.aborted) onAbort();
      else signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([provider.recognize(sourcePath, { signal: controller.signal }), deadline]);
  } finally {
    clearTimeout(timer);
    if (onAbort) options.signal?.removeEventListener('abort', onAbort);
  }
}
