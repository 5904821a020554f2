import { createHandler } from '../../lib/handler';
import { pathParam, queryParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * GET /households/{householdId}/locations/check-name?name=
 */
export const handler = createHandler('checkLocationName', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const name = queryParam(event, 'name') ?? '';

  const availability = await services.locationService.isLocationNameAvailable(claims, householdId, name);
  return okResponse(availability);
});
