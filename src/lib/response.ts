/**
 * Response envelopes for the API Gateway proxy integration
 *
 * Success bodies are `{ data, message? }`; failures are
 * `{ error: { code, message, details? } }`. Every response carries CORS headers.
 */

import type { APIGatewayProxyResult } from 'aws-lambda';
import { ZodError } from 'zod';
import { AppError, UnexpectedError, isAppError } from './errors';
import { logger } from './logger';

export interface SuccessResponse<T = unknown> {
  data: T;
  message?: string;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,X-Amz-Date,Authorization,X-Api-Key,X-Amz-Security-Token',
  'Access-Control-Allow-Methods': 'GET,POST,PUT,PATCH,DELETE,OPTIONS',
  'Content-Type': 'application/json',
};

const json = (statusCode: number, body: SuccessResponse | ErrorResponse): APIGatewayProxyResult => ({
  statusCode,
  headers: { ...CORS_HEADERS },
  body: JSON.stringify(body),
});

export const okResponse = <T>(data: T, message?: string): APIGatewayProxyResult =>
  json(200, message === undefined ? { data } : { data, message });

export const createdResponse = <T>(data: T, message = 'Resource created successfully'): APIGatewayProxyResult =>
  json(201, { data, message });

export const noContentResponse = (): APIGatewayProxyResult => ({
  statusCode: 204,
  headers: { ...CORS_HEADERS },
  body: '',
});

export const errorResponse = (
  statusCode: number,
  code: string,
  message: string,
  details?: unknown
): APIGatewayProxyResult =>
  json(statusCode, { error: details === undefined ? { code, message } : { code, message, details } });

// Everything toJSON() adds beyond the code and message
const detailsOf = (error: AppError): Record<string, unknown> | undefined => {
  const { error: _code, message: _message, ...rest } = error.toJSON();
  return Object.keys(rest).length > 0 ? rest : undefined;
};

const fromZodError = (zodError: ZodError): APIGatewayProxyResult => {
  const fields = zodError.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
  logger.warn('Validation error', { errors: fields });
  return errorResponse(400, 'VALIDATION_ERROR', 'Request validation failed', fields);
};

/**
 * Map anything a handler throws onto an error response.
 * Anything unclassified becomes an UnexpectedError carrying the original as its cause.
 * 5xx errors log at ERROR; client errors at WARN.
 */
export const handleError = (error: unknown): APIGatewayProxyResult => {
  if (error instanceof ZodError) {
    return fromZodError(error);
  }

  const appError = isAppError(error) ? error : new UnexpectedError('An unexpected error occurred', error);

  if (appError.statusCode >= 500) {
    logger.error('Request failed', appError, { code: appError.code });
  } else {
    logger.warn('Request rejected', { code: appError.code, message: appError.message });
  }
  return errorResponse(appError.statusCode, appError.code, appError.message, detailsOf(appError));
};
