import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * GET /products/{productId}
 */
export const handler = createHandler('getProduct', async ({ event, claims, services }) => {
  const productId = pathParam(event, 'productId');
  const product = await services.productService.getProductById(claims, productId);
  return okResponse(product);
});
