import { createHandler } from '../../lib/handler';
import { readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { BulkImportSchema } from '../../types/schemas';

/**
 * POST /products/bulk
 * Admin only. Body is an array of product requests; duplicates and invalid entries are skipped.
 */
export const handler = createHandler('bulkImportProducts', async ({ event, claims, services }) => {
  const requests = readBody(event, BulkImportSchema);
  const imported = await services.productService.bulkImportProducts(claims, requests);
  return okResponse(imported, `Imported ${imported.length} of ${requests.length} products`);
});
