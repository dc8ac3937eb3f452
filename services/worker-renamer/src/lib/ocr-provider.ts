/**
 * OCR Provider Wiring
 *
 * PDFs are read from their text layer first; scanned pages fall back to
 * the vision model (when enabled) and finally to a sidecar .txt.
 */

import {
  FallbackOcrProvider,
  PlainTextOcrProvider,
  RoutingOcrProvider,
  type OcrProvider,
  type OcrProviderName,
} from '@docnamer/shared';
import { PdfTextLayerProvider } from './pdf';
import { OpenAiVisionOcrProvider } from './llm';

export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.tif', '.tiff', '.bmp', '.gif'];

export interface OcrProviderDeps {
  pdf?: OcrProvider;
  vision?: OcrProvider;
  plainText?: OcrProvider;
}

export function createOcrProvider(name: OcrProviderName, deps: OcrProviderDeps = {}): OcrProvider {
  const plainText = deps.plainText ?? new PlainTextOcrProvider();
  const pdf = deps.pdf ?? new PdfTextLayerProvider();

  if (name === 'text-layer') {
    return new RoutingOcrProvider({ '.pdf': new FallbackOcrProvider(pdf, plainText), '.txt': plainText }, plainText);
  }

  const vision = deps.vision ?? new OpenAiVisionOcrProvider();
  const imageProvider = new FallbackOcrProvider(vision, plainText);
  const routes: Record<string, OcrProvider> = {
    '.pdf': new FallbackOcrProvider(new FallbackOcrProvider(pdf, vision), plainText),
    '.txt': plainText,
  };
  for (const ext of IMAGE_EXTENSIONS) {
    routes[ext] = imageProvider;
  }

  return new RoutingOcrProvider(routes, plainText);
}
