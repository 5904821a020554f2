import { createHandler } from '../../lib/handler';
import { okResponse } from '../../lib/response';

/**
 * GET /products/statistics
 */
export const handler = createHandler('getProductStatistics', async ({ claims, services }) => {
  const statistics = await services.productService.getProductStatistics(claims);
  return okResponse(statistics);
});
