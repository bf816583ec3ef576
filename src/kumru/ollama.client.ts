import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { KUMRU_CONFIG, KumruConfig } from './kumru.config';
import { describeError, InferenceError, InferenceUnavailableError } from './kumru.errors';
import { GenerateRequest, GenerateResponse } from './kumru.types';

const GENERATE_PATH = '/api/generate';

const isGenerateResponse = (data: unknown): data is GenerateResponse => {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return false;
  }
  return !('response' in data) || data.response === undefined || typeof data.response === 'string';
};

/**
 * Thin client for Ollama's non-streaming generate endpoint.
 */
@Injectable()
export class OllamaClient {
  private readonly logger = new Logger(OllamaClient.name);
  private readonly http: AxiosInstance;

  constructor(@Inject(KUMRU_CONFIG) private readonly config: KumruConfig) {
    this.http = axios.create({
      baseURL: config.ollamaUrl,
      timeout: config.timeoutMs,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  /**
   * Sends one prompt and resolves with the generated text, or `''` when the
   * server omits it.
   *
   * @throws {InferenceUnavailableError} when no HTTP response was received
   * @throws {InferenceError} on a timeout, a non-2xx status or a malformed body
   */
  async generate(prompt: string): Promise<string> {
    const payload: GenerateRequest = {
      model: this.config.modelName,
      prompt,
      stream: false,
    };

    let data: unknown;
    try {
      const response = await this.http.post<unknown>(GENERATE_PATH, payload);
      data = response.data;
    } catch (error) {
      throw this.toInferenceError(error);
    }

    if (!isGenerateResponse(data)) {
      throw new InferenceError('Malformed response from the inference server');
    }
    return data.response ?? '';
  }

  private toInferenceError(error: unknown): InferenceError {
    if (!axios.isAxiosError(error)) {
      return new InferenceError(describeError(error), { cause: error });
    }
    if (error.response) {
      return new InferenceError(
        `Inference server responded with status ${error.response.status}`,
        { cause: error },
      );
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new InferenceError(
        `Inference request timed out after ${this.config.timeoutMs}ms`,
        { cause: error },
      );
    }
    const reason = error.message || error.code || 'connection failed';
    this.logger.warn(`Cannot reach ${this.config.ollamaUrl}: ${reason}`);
    return new InferenceUnavailableError(reason, { cause: error });
  }
}
