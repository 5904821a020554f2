import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { noContentResponse } from '../../lib/response';

/**
 * DELETE /locations/{locationId}
 */
export const handler = createHandler('deleteLocation', async ({ event, claims, services }) => {
  const locationId = pathParam(event, 'locationId');
  await services.locationService.deleteLocation(claims, locationId);
  return noContentResponse();
});
