import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { UpdateLocationSchema } from '../../types/schemas';

/**
 * PUT /locations/{locationId}
 */
export const handler = createHandler('updateLocation', async ({ event, claims, services }) => {
  const locationId = pathParam(event, 'locationId');
  const request = readBody(event, UpdateLocationSchema);

  const location = await services.locationService.updateLocation(claims, locationId, request);
  return okResponse(location, 'Location updated successfully');
});
