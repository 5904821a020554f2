/**
 * Authentication Utilities - Household Inventory
 *
 * Pulls the token claims out of an API Gateway event. Tokens are verified by
 * the API Gateway authorizer before the Lambda runs, so nothing here checks
 * signatures.
 */

import { APIGatewayProxyEvent } from 'aws-lambda';
import { z } from 'zod';
import { AuthenticationRequiredError } from './errors';
import { Logger } from './logger';

/**
 * Claims the service layer reads from a verified token
 */
export interface TokenClaims {
  sub?: string;
  email?: string;
  name?: string;
}

const ClaimsSchema = z.object({
  sub: z.string().optional().catch(undefined),
  email: z.string().optional().catch(undefined),
  name: z.string().optional().catch(undefined),
});

const AuthorizerSchema = z.union([
  z.object({ claims: z.record(z.string(), z.unknown()) }),
  z.object({ jwt: z.object({ claims: z.record(z.string(), z.unknown()) }) }),
]);

const LOCAL_CLAIMS: TokenClaims = {
  sub: 'local-user',
  email: 'local.user@example.com',
  name: 'Local User',
};

/**
 * Decode JWT payload (without verification - already verified by the authorizer)
 */
const decodeJWT = (token: string): unknown => {
  const parts = token.split('.');
  const payload = parts[1];
  if (parts.length !== 3 || !payload) {
    throw new AuthenticationRequiredError('Invalid bearer token');
  }

  try {
    return JSON.parse(Buffer.from(payload, 'base64url').toString('utf8'));
  } catch (error) {
    throw new AuthenticationRequiredError('Invalid bearer token payload', { cause: error });
  }
};

const toTokenClaims = (raw: unknown): TokenClaims => {
  const parsed = ClaimsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AuthenticationRequiredError('Token claims are not readable');
  }
  const { sub, email, name } = parsed.data;
  return {
    ...(sub !== undefined ? { sub } : {}),
    ...(email !== undefined ? { email } : {}),
    ...(name !== undefined ? { name } : {}),
  };
};

/**
 * Get the token claims of the caller
 *
 * Order: REST API authorizer claims, HTTP API JWT authorizer claims, then the
 * payload of the bearer token in the Authorization header. Under
 * AWS_SAM_LOCAL a fixed local identity is returned.
 */
export const getTokenClaims = (event: APIGatewayProxyEvent, logger?: Logger): TokenClaims => {
  if (process.env['AWS_SAM_LOCAL'] === 'true') {
    logger?.warn('Using mock authentication for local development');
    return { ...LOCAL_CLAIMS };
  }

  const authorizer = AuthorizerSchema.safeParse(event.requestContext.authorizer);
  if (authorizer.success) {
    const source = authorizer.data;
    return toTokenClaims('claims' in source ? source.claims : source.jwt.claims);
  }

  const authHeader = event.headers?.['Authorization'] ?? event.headers?.['authorization'];
  const token = authHeader?.replace(/^Bearer\s+/i, '').trim();
  if (!token) {
    throw new AuthenticationRequiredError();
  }

  return toTokenClaims(decodeJWT(token));
};
