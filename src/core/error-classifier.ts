/**
 * Error Classifier
 *
 * Turns a failed service response into a ServiceError. The service's error
 * envelope is `{ status, code, message, developerMessage, moreInfo }`; any
 * body that does not match it yields a generic "unknown error" carrying the
 * HTTP status as both status and code.
 */

import { z } from 'zod';
import type { ApiError } from './types.js';
import type { HttpResponse } from './http-transport.js';
import { ServiceError } from '../utils/errors.js';

export const UNKNOWN_ERROR_MESSAGE = 'unknown error';

export const ApiErrorSchema = z.object({
  status: z.number().int(),
  code: z.number().int(),
  message: z.string(),
  developerMessage: z.string().optional(),
  moreInfo: z.string().optional(),
});

export function isErrorResponse(response: HttpResponse): boolean {
  return response.status >= 400;
}

/**
 * Parse the error envelope of a failed response.
 */
export function toApiError(response: HttpResponse): ApiError {
  const parsed = ApiErrorSchema.safeParse(response.body);
  if (!parsed.success) {
    return {
      status: response.status,
      code: response.status,
      message: UNKNOWN_ERROR_MESSAGE,
      developerMessage: UNKNOWN_ERROR_MESSAGE,
    };
  }

  const { status, code, message, developerMessage, moreInfo } = parsed.data;
  return {
    status,
    code,
    message,
    developerMessage: developerMessage ?? message,
    ...(moreInfo !== undefined && { moreInfo }),
  };
}

export function classifyResponse(response: HttpResponse): ServiceError {
  return ServiceError.fromApiError(toApiError(response));
}

/**
 * Return the response unchanged when it succeeded, otherwise throw its ServiceError.
 */
export function assertSuccess(response: HttpResponse): HttpResponse {
  if (isErrorResponse(response)) {
    throw classifyResponse(response);
  }
  return response;
}
