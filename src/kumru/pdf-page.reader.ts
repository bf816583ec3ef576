import { Injectable, Logger } from '@nestjs/common';
import pdfParse from 'pdf-parse';
import { describeError, PdfDecodeError } from './kumru.errors';
import { PdfPage } from './kumru.types';

interface PdfTextItem {
  str: string;
  transform: number[];
}

interface PdfTextContent {
  items: PdfTextItem[];
}

const TEXT_CONTENT_OPTIONS = {
  normalizeWhitespace: false,
  disableCombineTextItems: false,
};

/**
 * Joins a page's text items, starting a new line whenever the baseline moves.
 */
export const joinTextItems = (items: PdfTextItem[]): string => {
  let text = '';
  let lastY: number | undefined;
  for (const item of items) {
    const y = item.transform[5];
    if (lastY !== undefined && y !== lastY) {
      text += '\n';
    }
    text += item.str;
    lastY = y;
  }
  return text;
};

/**
 * Copies the bytes into a buffer that owns its whole ArrayBuffer. The pdf.js
 * build inside pdf-parse reads from the start of the underlying ArrayBuffer,
 * which breaks on small pooled buffers and slices with a non-zero byteOffset.
 */
export const toStandaloneBuffer = (buffer: Buffer): Buffer => {
  if (buffer.byteOffset === 0 && buffer.byteLength === buffer.buffer.byteLength) {
    return buffer;
  }
  const copy = Buffer.alloc(buffer.length);
  buffer.copy(copy);
  return copy;
};

@Injectable()
export class PdfPageReader {
  private readonly logger = new Logger(PdfPageReader.name);

  /**
   * Decodes a PDF and returns every page in ascending order with its trimmed
   * text. Throws {@link PdfDecodeError} when the bytes are not a readable PDF.
   */
  async readPages(buffer: Buffer): Promise<PdfPage[]> {
    const texts = new Map<number, string>();
    let pageCount: number;

    try {
      const result = await pdfParse(toStandaloneBuffer(buffer), {
        // pdf-parse awaits whatever the render callback returns, although its
        // typings declare a plain string.
        pagerender: (pageData) =>
          pageData
            .getTextContent(TEXT_CONTENT_OPTIONS)
            .then((content: PdfTextContent) => {
              const text = joinTextItems(content.items);
              texts.set(pageData.pageNumber, text);
              return text;
            }),
      });
      pageCount = result.numpages;
    } catch (error) {
      throw new PdfDecodeError(`Failed to parse PDF: ${describeError(error)}`, { cause: error });
    }

    const pages: PdfPage[] = [];
    for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
      pages.push({ pageNumber, text: (texts.get(pageNumber) ?? '').trim() });
    }
    this.logger.debug(`Read ${pages.length} page(s) from a ${buffer.length}-byte PDF`);
    return pages;
  }
}
