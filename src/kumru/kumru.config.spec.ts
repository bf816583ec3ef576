import { DEFAULT_KUMRU_CONFIG, loadKumruConfig } from './kumru.config';

describe('loadKumruConfig', () => {
  it('uses the defaults for an empty environment', () => {
    expect(loadKumruConfig({})).toEqual({
      ollamaUrl: 'http://ollama:11434',
      modelName: 'receptim/kumru-2b',
      timeoutMs: 120000,
      port: 3000,
      apiPrefix: 'api/v1',
      maxUploadBytes: 52428800,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadKumruConfig({
      OLLAMA_URL: 'http://localhost:11434/',
      OLLAMA_MODEL_NAME: 'llama3',
      OLLAMA_TIMEOUT_MS: '5000',
      PORT: '8080',
      API_PREFIX: '/v2/',
      MAX_UPLOAD_BYTES: '1024',
    });

    expect(config).toEqual({
      ollamaUrl: 'http://localhost:11434',
      modelName: 'llama3',
      timeoutMs: 5000,
      port: 8080,
      apiPrefix: 'v2',
      maxUploadBytes: 1024,
    });
  });

  it('falls back on invalid numbers and blank strings', () => {
    const config = loadKumruConfig({
      OLLAMA_MODEL_NAME: '   ',
      OLLAMA_TIMEOUT_MS: 'soon',
      PORT: '-1',
      MAX_UPLOAD_BYTES: '1.5',
    });

    expect(config.modelName).toBe(DEFAULT_KUMRU_CONFIG.modelName);
    expect(config.timeoutMs).toBe(DEFAULT_KUMRU_CONFIG.timeoutMs);
    expect(config.port).toBe(DEFAULT_KUMRU_CONFIG.port);
    expect(config.maxUploadBytes).toBe(DEFAULT_KUMRU_CONFIG.maxUploadBytes);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadKumruConfig({}))).toBe(true);
  });
});
