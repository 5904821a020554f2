import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * POST /products/{productId}/retry
 * Admin only
 */
export const handler = createHandler('retryProductEnrichment', async ({ event, claims, services }) => {
  const productId = pathParam(event, 'productId');
  const product = await services.productService.retryApiEnrichment(claims, productId);
  return okResponse(
    product,
    product.requiresApiRetry ? 'Product still not found in UPC API' : 'Product enriched successfully'
  );
});
