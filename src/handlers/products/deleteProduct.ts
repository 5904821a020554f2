import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { noContentResponse } from '../../lib/response';

/**
 * DELETE /products/{productId}
 * Admin only
 */
export const handler = createHandler('deleteProduct', async ({ event, claims, services }) => {
  const productId = pathParam(event, 'productId');
  await services.productService.deleteProduct(claims, productId);
  return noContentResponse();
});
