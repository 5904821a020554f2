import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * GET /locations/{locationId}
 */
export const handler = createHandler('getLocation', async ({ event, claims, services }) => {
  const locationId = pathParam(event, 'locationId');
  const location = await services.locationService.getLocationById(claims, locationId);
  return okResponse(location);
});
