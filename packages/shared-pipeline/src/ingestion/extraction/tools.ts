/**
 * FILE PURPOSE: Command-line implementations of the extraction capabilities
 *
 * Tools:
 *   pdftotext (poppler)  → text layer, read from stdout
 *   gs (Ghostscript)     → one multi-page 24-bit TIFF at the requested dpi
 *   tesseract            → hOCR markup at <outputBase>.hocr
 */

import { runTool } from '../../tools/exec.js';
import type { OcrEngine, Rasterizer, TextLayerExtractor } from '../types.js';

export const HOCR_EXTENSION = '.hocr';

interface ToolOptions {
  timeoutMs: number;
}

export class PdfToTextExtractor implements TextLayerExtractor {
  constructor(private readonly options: ToolOptions) {}

  async extractText(path: string): Promise<string> {
    const { stdout } = await runTool('pdftotext', [path, '-'], { timeoutMs: this.options.timeoutMs });
    return stdout;
  }
}

export class GhostscriptRasterizer implements Rasterizer {
  constructor(private readonly options: ToolOptions) {}

  async rasterize(path: string, outputPath: string, dpi: number): Promise<void> {
    await runTool('gs', [
      '-q',
      '-dNOPAUSE',
      '-dBATCH',
      '-sDEVICE=tiff24nc',
      `-r${dpi}`,
      `-sOutputFile=${outputPath}`,
      path,
    ], { timeoutMs: this.options.timeoutMs });
  }
}

export class TesseractOcr implements OcrEngine {
  constructor(private readonly options: ToolOptions) {}

  async recognize(imagePath: string, outputBase: string, lang: string): Promise<string> {
    await runTool('tesseract', [imagePath, outputBase, 'hocr', '-l', lang], { timeoutMs: this.options.timeoutMs });
    return `${outputBase}${HOCR_EXTENSION}`;
  }
}
