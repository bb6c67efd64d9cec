import fs from 'node:fs/promises';

export type ExtractedText = {
  text: string;
  pages: number;
};

export interface TextExtractor {
  extract(filePath: string): Promise<ExtractedText>;
}

/**
 * Pages are joined in order; a page without a text layer (a scan, a full-page image)
 * contributes an empty string. Whether the whole document is empty is decided by the caller.
 */
export class PdfTextExtractor implements TextExtractor {
  async extract(filePath: string): Promise<ExtractedText> {
    // Loaded on first use: the package runs a self-test when imported without a parent module.
    const { default: pdfParse } = await import('pdf-parse');
    const fileBuffer = await fs.readFile(filePath);
    const result = await pdfParse(fileBuffer);

    return {
      text: result.text ?? '',
      pages: typeof result.numpages === 'number' ? Math.max(0, Math.trunc(result.numpages)) : 0,
    };
  }
}
