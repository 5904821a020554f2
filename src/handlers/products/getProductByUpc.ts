import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * GET /products/upc/{upc}
 */
export const handler = createHandler('getProductByUpc', async ({ event, claims, services }) => {
  const upc = pathParam(event, 'upc');
  const product = await services.productService.getProductByUpc(claims, upc);
  return okResponse(product);
});
