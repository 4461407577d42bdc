import type { ErrorResponse } from '@aa-savings/types';

export type ErrorEnvelope = ErrorResponse;

const STATUS_CODE_MAP: Record<number, string> = {
  400: 'ERR_BAD_REQUEST',
  404: 'ERR_NOT_FOUND',
  409: 'ERR_CONFLICT',
  429: 'ERR_RATE_LIMITED',
  500: 'ERR_INTERNAL',
  502: 'ERR_BAD_GATEWAY',
  503: 'ERR_UNAVAILABLE',
  504: 'ERR_GATEWAY_TIMEOUT',
};

export function errorResponse(
  message: string,
  code = 'ERR_REQUEST',
  details?: unknown
): ErrorEnvelope {
  return { error: { code, message, ...(details === undefined ? {} : { details }) } };
}

export function errorResponseForStatus(
  status: number,
  message: string,
  details?: unknown
): ErrorEnvelope {
  const code = STATUS_CODE_MAP[status] ?? 'ERR_REQUEST';
  return errorResponse(message, code, details);
}

/** Text recorded for a failed unit; never empty. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === 'string' && err) return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
