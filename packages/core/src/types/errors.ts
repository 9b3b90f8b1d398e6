/**
 * Error hierarchy for the report pipeline.
 * Every error carries a stable code, a severity and a typed context.
 */

import { ErrorCode, type Severity, getExitCode } from '../errors/codes.js';

export interface ErrorContext {
  path?: string; // file the error concerns (artifact, manifest, output)
  field?: string; // metric field, e.g. 'cpuPercent'
  token?: string; // offending raw token
  tool?: string;
  scenario?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  cause?: { name: string; message: string };
}

interface PortbenchErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all pipeline errors
 */
export abstract class PortbenchError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor({
    message,
    errorCode,
    severity = 'error',
    context,
    cause,
  }: PortbenchErrorParams) {
    super(message, { cause });
    this.name = new.target.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  getExitCode(): number {
    return getExitCode(this.errorCode);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
  }
}

/**
 * Expected artifact does not exist or cannot be read (recovered as an empty sample)
 */
export class ArtifactMissingError extends PortbenchError {
  constructor(path: string, cause?: Error) {
    const absent = cause !== undefined && 'code' in cause && cause.code === 'ENOENT';
    super({
      message: absent
        ? `Artifact ${path} not found`
        : `Artifact ${path} unreadable${cause ? `: ${cause.message}` : ''}`,
      errorCode: ErrorCode.ARTIFACT_MISSING,
      severity: 'warn',
      context: { path },
      cause,
    });
  }
}

/**
 * A matched line carried a token that is not a valid number for its field
 */
export class MalformedFieldError extends PortbenchError {
  constructor(field: string, token: string) {
    super({
      message: `Malformed value "${token}" for ${field}`,
      errorCode: ErrorCode.MALFORMED_FIELD,
      severity: 'warn',
      context: { field, token },
    });
  }
}

export class ManifestError extends PortbenchError {
  constructor(path: string, reason: string, cause?: Error) {
    super({
      message: `Manifest ${path} is invalid: ${reason}`,
      errorCode: ErrorCode.MANIFEST_INVALID,
      severity: 'warn',
      context: { path },
      cause,
    });
  }
}

/**
 * Neither a manifest nor any configured artifact could be read
 */
export class MissingInputError extends PortbenchError {
  constructor(resultsDir: string, manifestPath: string) {
    super({
      message: `No manifest (${manifestPath}) and no readable artifacts under ${resultsDir}`,
      errorCode: ErrorCode.MISSING_MANDATORY_INPUT,
      context: { path: resultsDir, manifestPath },
    });
  }
}

export class ArtifactWriteError extends PortbenchError {
  constructor(path: string, cause?: Error) {
    super({
      message: `Failed to write ${path}${cause ? `: ${cause.message}` : ''}`,
      errorCode: ErrorCode.WRITE_FAILED,
      context: { path },
      cause,
    });
  }
}

export class ConfigurationError extends PortbenchError {
  constructor(message: string, context?: ErrorContext) {
    super({
      message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context,
    });
  }
}

export function isPortbenchError(error: unknown): error is PortbenchError {
  return error instanceof PortbenchError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
