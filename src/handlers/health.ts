import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { getServiceContainer } from '../lib/container';
import { logger } from '../lib/logger';
import { handleError, okResponse } from '../lib/response';

const SERVICE_VERSION = '1.0.0';

/**
 * GET /health
 * No authentication. An unreachable UPC API degrades the report but still answers 200.
 */
export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  logger.info('Health check request', { requestId: event.requestContext.requestId });

  try {
    const upcApi = (await getServiceContainer().upcApiService.isServiceAvailable()) ? 'available' : 'unavailable';

    return okResponse({
      status: upcApi === 'available' ? 'healthy' : 'degraded',
      dependencies: { upcApi },
      environment: process.env['NODE_ENV'] || 'unknown',
      version: SERVICE_VERSION,
      timestamp: new Date().toISOString(),
    });
  } catch (error) {
    return handleError(error);
  }
};
