import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { PatchSchema } from '../../types/schemas';

/**
 * PATCH /products/{productId}
 * Admin only
 */
export const handler = createHandler('patchProduct', async ({ event, claims, services }) => {
  const productId = pathParam(event, 'productId');
  const patch = readBody(event, PatchSchema);

  const product = await services.productService.patchProduct(claims, productId, patch);
  return okResponse(product, 'Product updated successfully');
});
