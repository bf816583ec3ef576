import {
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { describeError, InferenceUnavailableError, stackOf } from './kumru.errors';
import {
  buildExtractionPrompt,
  buildVerbatimPrompt,
  formatPageFailure,
  formatPageSection,
} from './kumru.prompts';
import { KumruResponse, PdfPage } from './kumru.types';
import { OllamaClient } from './ollama.client';
import { PdfPageReader } from './pdf-page.reader';

@Injectable()
export class KumruService {
  private readonly logger = new Logger(KumruService.name);

  constructor(
    private readonly ollamaClient: OllamaClient,
    private readonly pdfPageReader: PdfPageReader,
  ) {}

  async ask(question: string): Promise<KumruResponse> {
    try {
      const answer = await this.ollamaClient.generate(question);
      return { kumru_response: answer };
    } catch (error) {
      if (error instanceof InferenceUnavailableError) {
        this.logger.error(`Ollama is unavailable: ${error.message}`);
        throw new ServiceUnavailableException(`Ollama service is unavailable: ${error.message}`);
      }
      const reason = describeError(error);
      this.logger.error(`Error answering question: ${reason}`, stackOf(error));
      throw new InternalServerErrorException(`An unexpected error occurred: ${reason}`);
    }
  }

  /**
   * Transcribes every page that has a text layer, verbatim. Pages without text
   * are skipped, and the first failure aborts the whole document.
   */
  async transcribeDocument(buffer: Buffer): Promise<KumruResponse> {
    try {
      const pages = await this.pdfPageReader.readPages(buffer);
      let output = '';

      for (const page of pages) {
        if (!page.text) {
          this.logger.debug(`Skipping page ${page.pageNumber}: no text`);
          continue;
        }
        const pageOutput = await this.ollamaClient.generate(buildVerbatimPrompt(page));
        output += formatPageSection(page.pageNumber, pageOutput);
      }

      return { kumru_response: output };
    } catch (error) {
      throw this.toProcessingError(error);
    }
  }

  /**
   * Sends every page to the model, asking for image-based extraction where a
   * page has no text. A page whose call fails gets a placeholder and the rest
   * of the document still goes through.
   */
  async transcribePdf(buffer: Buffer): Promise<KumruResponse> {
    try {
      const pages = await this.pdfPageReader.readPages(buffer);
      let output = '';

      for (const page of pages) {
        output += formatPageSection(page.pageNumber, await this.extractPage(page));
      }

      return { kumru_response: output };
    } catch (error) {
      throw this.toProcessingError(error);
    }
  }

  private async extractPage(page: PdfPage): Promise<string> {
    try {
      const pageOutput = await this.ollamaClient.generate(buildExtractionPrompt(page));
      return pageOutput.trim();
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn(`Model failed on page ${page.pageNumber}: ${reason}`);
      return formatPageFailure(page.pageNumber, reason);
    }
  }

  private toProcessingError(error: unknown): HttpException {
    const reason = describeError(error);
    this.logger.error(`Error processing PDF: ${reason}`, stackOf(error));
    return new InternalServerErrorException(`PDF processing error: ${reason}`);
  }
}
