export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Config error: ${message}`, options);
    this.name = 'ConfigError';
  }
}

export class ExtractionError extends Error {
  readonly status: number | null;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = 'ExtractionError';
    this.status = options?.status ?? null;
  }
}

/** Raised when the state snapshot cannot be read or durably replaced. */
export class StateError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StateError';
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
