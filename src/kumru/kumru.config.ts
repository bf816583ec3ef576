import { Module } from '@nestjs/common';

export const KUMRU_CONFIG = Symbol('KUMRU_CONFIG');

export interface KumruConfig {
  /** Base URL of the Ollama server, without a trailing slash. */
  readonly ollamaUrl: string;
  readonly modelName: string;
  /** Timeout for a single generate call, in milliseconds. */
  readonly timeoutMs: number;
  readonly port: number;
  /** Global route prefix, e.g. `api/v1`. */
  readonly apiPrefix: string;
  /** Largest accepted upload, in bytes. */
  readonly maxUploadBytes: number;
}

export const DEFAULT_KUMRU_CONFIG: KumruConfig = {
  ollamaUrl: 'http://ollama:11434',
  modelName: 'receptim/kumru-2b',
  timeoutMs: 120_000,
  port: 3000,
  apiPrefix: 'api/v1',
  maxUploadBytes: 50 * 1024 * 1024,
};

const readPositiveInt = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

const readString = (value: string | undefined, fallback: string): string => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
};

/**
 * Builds the relay configuration from environment variables. Unset, blank or
 * invalid values fall back to {@link DEFAULT_KUMRU_CONFIG}.
 */
export function loadKumruConfig(env: NodeJS.ProcessEnv = process.env): KumruConfig {
  return Object.freeze({
    ollamaUrl: readString(env.OLLAMA_URL, DEFAULT_KUMRU_CONFIG.ollamaUrl).replace(/\/+$/, ''),
    modelName: readString(env.OLLAMA_MODEL_NAME, DEFAULT_KUMRU_CONFIG.modelName),
    timeoutMs: readPositiveInt(env.OLLAMA_TIMEOUT_MS, DEFAULT_KUMRU_CONFIG.timeoutMs),
    port: readPositiveInt(env.PORT, DEFAULT_KUMRU_CONFIG.port),
    apiPrefix: readString(env.API_PREFIX, DEFAULT_KUMRU_CONFIG.apiPrefix).replace(/^\/+|\/+$/g, ''),
    maxUploadBytes: readPositiveInt(env.MAX_UPLOAD_BYTES, DEFAULT_KUMRU_CONFIG.maxUploadBytes),
  });
}

@Module({
  providers: [{ provide: KUMRU_CONFIG, useFactory: () => loadKumruConfig() }],
  exports: [KUMRU_CONFIG],
})
export class KumruConfigModule {}
