import { PdfPage } from './kumru.types';

// The default model is Turkish, so the page prompts are written in Turkish.

export const formatPageMarker = (pageNumber: number): string => `--- Page ${pageNumber} ---`;

/**
 * One page's block in an aggregated response. Blocks are appended in page
 * order, so a document's result always starts with a blank line.
 */
export const formatPageSection = (pageNumber: number, output: string): string =>
  `\n\n${formatPageMarker(pageNumber)}\n${output}`;

export const formatPageFailure = (pageNumber: number, reason: string): string =>
  `(Model error on page ${pageNumber}: ${reason})`;

/** Asks for the page text back, unchanged: no summary and nothing added. */
export const buildVerbatimPrompt = (page: PdfPage): string =>
  [
    `Sayfa ${page.pageNumber} içeriği:`,
    page.text,
    'Yukarıdaki sayfa metnini çıkar ve olduğu gibi yaz. ' +
      'Özetleme, yorum yapma ve kendinden hiçbir şey ekleme. Metnin tamamını ver:',
  ].join('\n\n');

/**
 * Prompt for the OCR-fallback mode. Pages without a text layer get an
 * image-extraction instruction instead; whether that works depends on the model.
 */
export const buildExtractionPrompt = (page: PdfPage): string => {
  if (page.text) {
    return `Sayfa ${page.pageNumber} metnini çıkar ve düzenle:\n\n${page.text}`;
  }
  return (
    `Sayfa ${page.pageNumber} metin katmanı içermiyor. ` +
    'Sayfa bir görüntü içeriyorsa görüntüdeki metni çıkar. ' +
    'Özetleme, yalnızca bu sayfadaki metni olduğu gibi ver. ' +
    'Metin okunamıyorsa bunu kısaca belirt.'
  );
};
