/**
 * Lambda handler scaffolding shared by every authenticated route
 */

import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { TokenClaims, getTokenClaims } from './auth';
import { ServiceContainer, getServiceContainer } from './container';
import { Logger, createLambdaLogger, logLambdaCompletion, logLambdaInvocation } from './logger';
import { handleError } from './response';

export type LambdaHandler = (
  event: APIGatewayProxyEvent,
  context: Context
) => Promise<APIGatewayProxyResult>;

export interface RequestContext {
  event: APIGatewayProxyEvent;
  claims: TokenClaims;
  services: ServiceContainer;
  logger: Logger;
}

/**
 * Wrap a route: log invocation, read token claims, run the action, map errors to responses
 */
export const createHandler = (
  functionName: string,
  action: (ctx: RequestContext) => Promise<APIGatewayProxyResult>
): LambdaHandler => {
  return async (event, context) => {
    const startTime = Date.now();
    const logger = createLambdaLogger(context.awsRequestId);
    logLambdaInvocation(logger, functionName, event);

    let result: APIGatewayProxyResult;
    try {
      const claims = getTokenClaims(event, logger);
      result = await action({ event, claims, services: getServiceContainer(), logger });
    } catch (error) {
      result = handleError(error);
    }

    logLambdaCompletion(logger, functionName, Date.now() - startTime, result.statusCode);
    return result;
  };
};
