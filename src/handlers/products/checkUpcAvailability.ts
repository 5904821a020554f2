import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { okResponse } from '../../lib/response';
import type { UpcAvailability } from '../../types/dto';

/**
 * GET /products/upc/{upc}/availability
 */
export const handler = createHandler('checkUpcAvailability', async ({ event, claims, services }) => {
  const upc = pathParam(event, 'upc');
  const { productService } = services;

  const availability: UpcAvailability = {
    upc,
    valid: productService.isValidUpc(upc),
    available: await productService.isUpcAvailable(claims, upc),
  };
  return okResponse(availability);
});
