import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { UpdateProductSchema } from '../../types/schemas';

/**
 * PUT /products/{productId}
 * Admin only
 */
export const handler = createHandler('updateProduct', async ({ event, claims, services }) => {
  const productId = pathParam(event, 'productId');
  const request = readBody(event, UpdateProductSchema);

  const product = await services.productService.updateProduct(claims, productId, request);
  return okResponse(product, 'Product updated successfully');
});
