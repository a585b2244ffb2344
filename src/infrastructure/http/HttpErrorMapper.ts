import { isAxiosError, isCancel, type AxiosInstance, type AxiosResponse } from 'axios';
import type { z, ZodTypeAny } from 'zod';
import { CancelledError, RemoteError } from '../../domain/errors';

export const MAX_ERROR_BODY_LENGTH = 2048;

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Renders a response body for an error message, capped at 2 KB of UTF-8
 * JSON bodies arrive decoded, so the cap applies to their re-serialized form
 */
export function describeBody(data: unknown): string {
  let text: string;
  if (typeof data === 'string') {
    text = data;
  } else if (data === undefined || data === null) {
    text = '';
  } else {
    try {
      text = JSON.stringify(data);
    } catch {
      text = String(data);
    }
  }
  return truncateUtf8(text, MAX_ERROR_BODY_LENGTH).trim();
}

function truncateUtf8(text: string, maxBytes: number): string {
  const bytes = Buffer.from(text, 'utf8');
  if (bytes.length <= maxBytes) {
    return text;
  }

  // Never split a multi-byte character
  let end = maxBytes;
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }
  return bytes.subarray(0, end).toString('utf8');
}

/**
 * Maps a rejected request to the pipeline's error taxonomy
 * Aborts become CancelledError, anything else a RemoteError with status 0
 */
export function toTransportError(error: unknown, signal?: AbortSignal): Error {
  if (signal?.aborted || isCancel(error)) {
    return new CancelledError();
  }

  if (isAxiosError(error)) {
    if (error.response) {
      return new RemoteError(error.response.status, describeBody(error.response.data));
    }
    return new RemoteError(0, error.code ? `${error.code}: ${error.message}` : error.message);
  }

  return new RemoteError(0, error instanceof Error ? error.message : String(error));
}

/**
 * GET a JSON document and validate it; non-2xx and payloads the schema rejects become RemoteError
 */
export async function getJson<S extends ZodTypeAny>(
  http: AxiosInstance,
  url: string,
  schema: S,
  signal?: AbortSignal
): Promise<z.infer<S>> {
  let response: AxiosResponse<unknown>;
  try {
    response = await http.get<unknown>(url, { signal });
  } catch (error) {
    throw toTransportError(error, signal);
  }

  if (!isSuccessStatus(response.status)) {
    throw new RemoteError(response.status, describeBody(response.data));
  }

  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    throw new RemoteError(response.status, `Unexpected payload: ${describeBody(response.data)}`);
  }

  return parsed.data;
}
