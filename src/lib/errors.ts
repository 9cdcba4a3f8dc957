/**
 * Error taxonomy shared by every extraction stage
 */

export type GrabErrorCode =
  | 'INVALID_URL'
  | 'PLAYLIST_NOT_VIDEO'
  | 'FETCH_ERROR'
  | 'PARSE_ERROR'
  | 'NO_CAPTIONS'
  | 'TRANSCRIPT_UNAVAILABLE'
  | 'INVALID_DURATION'
  | 'NOT_FOUND'
  | 'IO_ERROR'
  | 'MISSING_API_KEY';

export interface GrabErrorContext {
  /** Pipeline stage that failed, e.g. "watch-page" or "comments" */
  stage?: string;
  /** Video or playlist ID the stage was working on */
  id?: string;
  cause?: unknown;
}

export class GrabError extends Error {
  readonly code: GrabErrorCode;
  readonly stage?: string;
  readonly id?: string;

  constructor(code: GrabErrorCode, message: string, context: GrabErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'GrabError';
    this.code = code;
    this.stage = context.stage;
    this.id = context.id;
  }
}

export function isGrabError(error: unknown, code?: GrabErrorCode): error is GrabError {
  return error instanceof GrabError && (code === undefined || error.code === code);
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  if (typeof error === 'string' && error) {
    return error;
  }
  return fallback;
}

/**
 * Wrap a lower-level failure with stage and identifier context.
 * A GrabError keeps its code; it only gains the identifier if it had none.
 */
export function wrapError(
  error: unknown,
  code: GrabErrorCode,
  stage: string,
  id: string
): GrabError {
  if (error instanceof GrabError) {
    if (error.id) return error;
    return new GrabError(error.code, `${error.message} (${id})`, {
      stage: error.stage ?? stage,
      id,
      cause: error.cause,
    });
  }
  return new GrabError(code, `${stage} failed for ${id}: ${getErrorMessage(error)}`, {
    stage,
    id,
    cause: error,
  });
}
