export type BuildErrorCode = 'PARSE_ERROR' | 'RENDER_ERROR' | 'SLUG_COLLISION' | 'CONFIG_ERROR';

/**
 * Base class for every build-fatal failure. Carries the source file(s) the
 * failure is about so the CLI can point at them.
 */
export class BuildError extends Error {
  constructor(
    message: string,
    public readonly code: BuildErrorCode,
    public readonly filePaths: readonly string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BuildError';
  }
}

/** Malformed or missing front-matter, or a filename that yields no slug. */
export class ParseError extends BuildError {
  constructor(message: string, public readonly filePath: string, options?: { cause?: unknown }) {
    super(`${filePath}: ${message}`, 'PARSE_ERROR', [filePath], options);
    this.name = 'ParseError';
  }
}

/** Structurally broken body markup, e.g. a fence that is never closed. */
export class RenderError extends BuildError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line?: number,
    options?: { cause?: unknown },
  ) {
    super(`${filePath}${line !== undefined ? `:${line}` : ''}: ${message}`, 'RENDER_ERROR', [filePath], options);
    this.name = 'RenderError';
  }
}

export class CollisionError extends BuildError {
  constructor(public readonly slug: string, filePaths: readonly string[]) {
    super(`slug "${slug}" is produced by ${filePaths.length} documents: ${filePaths.join(', ')}`, 'SLUG_COLLISION', filePaths);
    this.name = 'CollisionError';
  }
}

export class ConfigError extends BuildError {
  constructor(message: string, filePath?: string, options?: { cause?: unknown }) {
    super(filePath ? `${filePath}: ${message}` : message, 'CONFIG_ERROR', filePath ? [filePath] : [], options);
    this.name = 'ConfigError';
  }
}

export function isBuildError(err: unknown): err is BuildError {
  return err instanceof BuildError;
}
