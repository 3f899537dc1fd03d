/**
 * Raised when the forex pair file cannot be read, parsed or written.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}
