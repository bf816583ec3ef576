/** A generate call failed after reaching (or trying to reach) the inference server. */
export class InferenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceError';
  }
}

/** The inference server could not be reached at all: no HTTP response came back. */
export class InferenceUnavailableError extends InferenceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceUnavailableError';
  }
}

export class PdfDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PdfDecodeError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const stackOf = (error: unknown): string | undefined =>
  error instanceof Error ? error.stack : undefined;
