// engine/errors.ts — Typed errors raised by the core

/**
 * The registry is missing, malformed, or fails validation.
 * Never retried: the caller has to fix the file.
 */
export class BridgeConfigError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}:\n${errors.join('\n')}` : message);
    this.name = 'BridgeConfigError';
    this.errors = errors;
  }
}

/**
 * A contract document could not be read or does not have the contract shape.
 */
export class ContractFormatError extends Error {
  readonly file: string | null;

  constructor(message: string, file: string | null = null, options?: { cause?: unknown }) {
    super(file ? `${message} (${file})` : message, options);
    this.name = 'ContractFormatError';
    this.file = file;
  }
}

/**
 * The version-control fetch of a provider repository failed.
 */
export class FetchError extends Error {
  readonly command: string;
  readonly stderr: string;

  constructor(command: string, stderr: string, options?: { cause?: unknown }) {
    super(`Git operation failed: ${command}\nError: ${stderr.trim() || 'unknown error'}`, options);
    this.name = 'FetchError';
    this.command = command;
    this.stderr = stderr;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
