import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { PatchSchema } from '../../types/schemas';

/**
 * PATCH /locations/{locationId}
 */
export const handler = createHandler('patchLocation', async ({ event, claims, services }) => {
  const locationId = pathParam(event, 'locationId');
  const patch = readBody(event, PatchSchema);

  const location = await services.locationService.patchLocation(claims, locationId, patch);
  return okResponse(location, 'Location updated successfully');
});
