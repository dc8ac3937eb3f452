/**
 * LLM Vision OCR
 *
 * Transcribes scanned documents (images, image-only PDFs) with the OpenAI
 * vision API. The model returns text blocks with a self-reported legibility
 * score, used as the block confidence.
 */

import fs from 'fs/promises';
import OpenAI from 'openai';
import {
  logger,
  config,
  extensionOf,
  freezeOcrResult,
  OcrTimeoutError,
  OcrUnavailableError,
  type OcrBlock,
  type OcrProvider,
  type RawOcrResult,
  type RecognizeOptions,
} from '@docnamer/shared';

const PROMPT_VERSION = '1.0.0';

const SYSTEM_PROMPT = `You transcribe scanned Brazilian contract, land registry and environmental compliance documents.
Return every line of visible text, top to bottom, exactly as written (keep accents, numbers and punctuation).
For each line give a legibility score between 0 and 1. Do not summarize or translate.`;

/**
 * JSON Schema for OpenAI Structured Outputs.
 */
const TRANSCRIPTION_SCHEMA = {
  name: 'document_transcription',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: ['blocks'],
    properties: {
      blocks: {
        type: 'array',
        items: {
          type: 'object',
          additionalProperties: false,
          required: ['text', 'confidence', 'page'],
          properties: {
            text: { type: 'string' },
            confidence: { type: 'number' },
            page: { type: 'integer' },
          },
        },
      },
    },
  },
} as const;

const MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate the model's JSON into OCR blocks; malformed entries are dropped.
 */
export function parseTranscription(content: string): OcrBlock[] {
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed) || !Array.isArray(parsed.blocks)) {
    throw new Error('Transcription response has no blocks');
  }

  const blocks: OcrBlock[] = [];
  for (const entry of parsed.blocks) {
    if (!isRecord(entry) || typeof entry.text !== 'string') continue;
    blocks.push({
      text: entry.text,
      confidence: typeof entry.confidence === 'number' ? entry.confidence : undefined,
      page: typeof entry.page === 'number' ? entry.page : undefined,
    });
  }
  return blocks;
}

type UserContent = OpenAI.Chat.Completions.ChatCompletionContentPart;

function documentPart(fileName: string, mimeType: string, base64: string): UserContent {
  if (mimeType === 'application/pdf') {
    return { type: 'file', file: { filename: fileName, file_data: `data:${mimeType};base64,${base64}` } };
  }
  return { type: 'image_url', image_url: { url: `data:${mimeType};base64,${base64}`, detail: 'high' } };
}

export class OpenAiVisionOcrProvider implements OcrProvider {
  readonly engine: string;
  private readonly client: OpenAI;

  constructor(
    private readonly model: string = config.llmModelOcr,
    client?: OpenAI
  ) {
    this.engine = `openai-vision:${model}`;
    this.client =
      client ??
      new OpenAI({
        apiKey: process.env.OPENAI_API_KEY || config.openaiApiKey,
        timeout: config.llmRequestTimeoutMs,
      });
  }

  async recognize(sourcePath: string, options: RecognizeOptions = {}): Promise<RawOcrResult> {
    const mimeType = MIME_TYPES[extensionOf(sourcePath)];
    if (!mimeType) {
      throw new OcrUnavailableError(`Vision OCR does not read ${extensionOf(sourcePath) || 'this file type'}`, {
        source_path: sourcePath,
      });
    }

    const data = await fs.readFile(sourcePath, { signal: options.signal });

    logger.info('Transcribing document with vision model', {
      model: this.model,
      prompt_version: PROMPT_VERSION,
      source_path: sourcePath,
      size_bytes: data.length,
    });

    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            {
              role: 'user',
              content: [
                documentPart(sourcePath.split(/[\\/]/).pop() ?? sourcePath, mimeType, data.toString('base64')),
                { type: 'text', text: 'Transcribe this document.' },
              ],
            },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: TRANSCRIPTION_SCHEMA,
          },
          max_tokens: 8192,
          temperature: 0,
        },
        { signal: options.signal }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error('Empty response from OpenAI vision');
      }

      const blocks = parseTranscription(content);

      logger.info('Vision transcription complete', {
        model: this.model,
        request_id: response.id,
        duration_seconds: (Date.now() - startTime) / 1000,
        blocks: blocks.length,
      });

      return freezeOcrResult({ source_path: sourcePath, engine: this.engine, blocks });
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new OcrTimeoutError(config.llmRequestTimeoutMs, { source_path: sourcePath, model: this.model });
      }
      if (error instanceof OpenAI.APIUserAbortError) {
        throw error;
      }
      if (error instanceof OpenAI.APIError) {
        throw new OcrUnavailableError(`Vision OCR unavailable: ${error.message}`, {
          source_path: sourcePath,
          status: error.status,
        });
      }
      logger.error('Vision transcription failed', error, { model: this.model, source_path: sourcePath });
      throw error;
    }
  }
}
