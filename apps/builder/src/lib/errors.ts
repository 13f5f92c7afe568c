export class QuireError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'QuireError';
  }
}

/**
 * Missing required setting, invalid permalink pattern, unknown or cyclic layout.
 * Always aborts the build before any output is written.
 */
export class ConfigurationError extends QuireError {
  constructor(message = 'Invalid site configuration', details?: unknown) {
    super(message, 'CONFIGURATION', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Malformed front matter, unresolved template token or markup that fails to render.
 * Fatal for the document unless skip-invalid mode is on.
 */
export class ContentError extends QuireError {
  constructor(public readonly sourcePath: string, message = 'Invalid content', details?: unknown) {
    super(`${sourcePath}: ${message}`, 'CONTENT', details);
    this.name = 'ContentError';
  }
}

/**
 * Two outputs resolved to the same path.
 */
export class OutputCollisionError extends QuireError {
  constructor(public readonly outputPath: string, public readonly origins: readonly [string, string]) {
    super(
      `Output path "${outputPath}" is produced by both "${origins[0]}" and "${origins[1]}"`,
      'OUTPUT_COLLISION',
      { outputPath, origins }
    );
    this.name = 'OutputCollisionError';
  }
}

/**
 * Message of an unknown thrown value, for wrapping library errors.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
