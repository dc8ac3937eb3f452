/**
 * PDF Text Layer
 *
 * Reads the embedded text layer of a PDF with pdf-parse. Scanned PDFs have
 * none; the provider then returns no text and the fallback takes over.
 */

import fs from 'fs/promises';
import {
  logger,
  freezeOcrResult,
  linesToBlocks,
  OcrUnavailableError,
  type OcrBlock,
  type OcrProvider,
  type RawOcrResult,
  type RecognizeOptions,
} from '@docnamer/shared';

export interface PdfTextResult {
  text: string;
  totalPages: number;
}

/**
 * Extract the text layer of a PDF buffer.
 * Loaded on first use: pdf-parse's entry point reads a bundled test file
 * when it is not required by another module.
 */
export async function extractTextFromPdf(data: Buffer): Promise<PdfTextResult> {
  const { default: pdfParse } = await import('pdf-parse');
  const parsed = await pdfParse(data);
  return { text: parsed.text, totalPages: parsed.numpages };
}

export class PdfTextLayerProvider implements OcrProvider {
  readonly engine = 'pdf-text-layer';

  async recognize(sourcePath: string, options: RecognizeOptions = {}): Promise<RawOcrResult> {
    let data: Buffer;
    try {
      data = await fs.readFile(sourcePath, { signal: options.signal });
    } catch (error) {
      if (options.signal?.aborted) throw error;
      throw new OcrUnavailableError(`Cannot read ${sourcePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    let result: PdfTextResult;
    try {
      result = await extractTextFromPdf(data);
    } catch (error) {
      throw new OcrUnavailableError(`Unreadable PDF ${sourcePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const blocks: OcrBlock[] = linesToBlocks(result.text);

    logger.debug('PDF text layer extracted', {
      source_path: sourcePath,
      pages: result.totalPages,
      blocks: blocks.length,
    });

    return freezeOcrResult({ source_path: sourcePath, engine: this.engine, blocks });
  }
}
