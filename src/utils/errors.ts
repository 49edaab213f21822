import { logger } from './logger.js';

export enum ErrorCodes {
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  UNKNOWN_FORMAT = 'UNKNOWN_FORMAT',
  SOURCE_NOT_FOUND = 'SOURCE_NOT_FOUND',
  TARGET_FILE_MISSING = 'TARGET_FILE_MISSING',
  DIST_CONFIG_ERROR = 'DIST_CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  ENCODING_ERROR = 'ENCODING_ERROR'
}

// Error types
export class ReadmeBuildError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ReadmeBuildError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Contradictory or out-of-range plugin options.
 */
export class InvalidConfigurationError extends ReadmeBuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_CONFIGURATION, details);
    this.name = 'InvalidConfigurationError';
  }
}

export class UnknownFormatError extends ReadmeBuildError {
  constructor(public readonly format: string, known: readonly string[]) {
    super(
      `Unknown README type '${format}'. Supported types: ${known.join(', ')}`,
      ErrorCodes.UNKNOWN_FORMAT,
      { format }
    );
    this.name = 'UnknownFormatError';
  }
}

export class SourceNotFoundError extends ReadmeBuildError {
  constructor(public readonly filename: string) {
    super(
      `Could not find source file ${filename} in the build` +
        ' - is source_filename right, or did a pruning plugin remove it?',
      ErrorCodes.SOURCE_NOT_FOUND,
      { filename }
    );
    this.name = 'SourceNotFoundError';
  }
}

export class TargetFileMissingError extends ReadmeBuildError {
  constructor(public readonly filename: string) {
    super(
      `Could not find a ${filename} file during the build` +
        ' - did you prune it away with a pruning plugin?',
      ErrorCodes.TARGET_FILE_MISSING,
      { filename }
    );
    this.name = 'TargetFileMissingError';
  }
}

export class DistConfigError extends ReadmeBuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.DIST_CONFIG_ERROR, details);
    this.name = 'DistConfigError';
  }
}

export class FileSystemError extends ReadmeBuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

/**
 * Text holds characters its declared single-byte encoding cannot represent.
 */
export class EncodingError extends ReadmeBuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.ENCODING_ERROR, details);
    this.name = 'EncodingError';
  }
}

/**
 * Wrap a commander action so failures are logged and turned into exit code 1.
 */
export function withErrorHandling<A extends unknown[]>(
  action: (...args: A) => Promise<void>
): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      if (error instanceof ReadmeBuildError) {
        logger.debug('Command failed', { code: error.code, details: error.details });
        console.error(`❌ ${error.message}`);
      } else {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('Unexpected command failure', { error });
        console.error(`❌ ${message}`);
      }
      process.exit(1);
    }
  };
}
