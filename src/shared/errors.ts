export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class HttpError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'HTTP_ERROR', details);
    this.name = 'HttpError';
  }
}

export class ListingError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LISTING_ERROR', details);
    this.name = 'ListingError';
  }
}

export class ExportError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXPORT_ERROR', details);
    this.name = 'ExportError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
