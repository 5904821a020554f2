import { createHandler } from '../../lib/handler';
import { readBody } from '../../lib/request';
import { createdResponse } from '../../lib/response';
import { CreateProductSchema } from '../../types/schemas';

/**
 * POST /products
 * Enriched from the UPC lookup when it knows the barcode
 */
export const handler = createHandler('createProduct', async ({ event, claims, services }) => {
  const request = readBody(event, CreateProductSchema);
  const product = await services.productService.createProduct(claims, request);
  return createdResponse(product, 'Product created successfully');
});
