/**
 * Failures raised by the stream-resolution pipeline
 */

export enum ResolutionErrorCode {
  REMOTE_ERROR = 'REMOTE_ERROR',
  EMPTY_HANDLE = 'EMPTY_HANDLE',
  INVALID_SELECTION = 'INVALID_SELECTION',
  METADATA_TIMEOUT = 'METADATA_TIMEOUT',
  LINKS_TIMEOUT = 'LINKS_TIMEOUT',
  EMPTY_DOWNLOAD_URL = 'EMPTY_DOWNLOAD_URL',
  NO_PLAYABLE_SOURCE = 'NO_PLAYABLE_SOURCE',
  CANCELLED = 'CANCELLED'
}

export class ResolutionError extends Error {
  constructor(
    readonly code: ResolutionErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ResolutionError';
  }
}

/**
 * Non-2xx response or transport failure; transport failures carry status 0
 */
export class RemoteError extends ResolutionError {
  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(
      ResolutionErrorCode.REMOTE_ERROR,
      status > 0 ? `Remote request failed (${status}): ${body}` : `Remote request failed: ${body}`
    );
    this.name = 'RemoteError';
  }
}

export class CancelledError extends ResolutionError {
  constructor(message: string = 'Operation cancelled') {
    super(ResolutionErrorCode.CANCELLED, message);
    this.name = 'CancelledError';
  }
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}
