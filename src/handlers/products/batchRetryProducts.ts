import { createHandler } from '../../lib/handler';
import { queryParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * POST /products/retry-batch?maxRetryAttempts=
 * Admin only
 */
export const handler = createHandler('batchRetryProducts', async ({ event, claims, services }) => {
  const limit = queryParam(event, 'maxRetryAttempts');
  const enriched = await services.productService.processBatchRetry(
    claims,
    limit === undefined ? undefined : Number(limit)
  );
  return okResponse({ enriched });
});
