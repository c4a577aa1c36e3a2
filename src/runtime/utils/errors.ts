/**
 * Error types surfaced at the CLI boundary
 */

export type MdGraphErrorKind = 'input' | 'config' | 'connection' | 'statement' | 'data';

export class MdGraphError extends Error {
  constructor(
    public readonly kind: MdGraphErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MdGraphError';
  }
}

export class ConfigError extends MdGraphError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Best-effort message extraction for anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
