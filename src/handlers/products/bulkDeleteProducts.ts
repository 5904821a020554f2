import { createHandler } from '../../lib/handler';
import { readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { BulkDeleteSchema } from '../../types/schemas';

/**
 * DELETE /products/bulk
 * Admin only. Body: { "productIds": [...] }
 */
export const handler = createHandler('bulkDeleteProducts', async ({ event, claims, services }) => {
  const { productIds } = readBody(event, BulkDeleteSchema);
  const deleted = await services.productService.bulkDeleteProducts(claims, productIds);
  return okResponse({ deleted });
});
