/**
 * Reading path, query and body values off API Gateway proxy events
 */

import type { APIGatewayProxyEvent } from 'aws-lambda';
import type { z } from 'zod';
import { ValidationError } from './errors';
import { parseRequest } from './validation';

export const pathParam = (event: APIGatewayProxyEvent, name: string): string => {
  const value = event.pathParameters?.[name];
  if (!value) {
    throw new ValidationError(`Missing required path parameter: ${name}`, name);
  }
  return value;
};

/**
 * Blank query values read as absent
 */
export const queryParam = (event: APIGatewayProxyEvent, name: string): string | undefined => {
  const value = event.queryStringParameters?.[name];
  return value ? value : undefined;
};

export const queryParams = (event: APIGatewayProxyEvent): Record<string, string | undefined> =>
  event.queryStringParameters ?? {};

/**
 * Decode the JSON body and validate it against `schema`
 */
export function readBody<S extends z.ZodTypeAny>(event: APIGatewayProxyEvent, schema: S): z.output<S> {
  if (!event.body) {
    throw new ValidationError('Request body is required', 'body');
  }

  const raw = event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf8') : event.body;
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new ValidationError('Invalid JSON in request body', 'body');
  }

  return parseRequest(schema, payload);
}
