import { createHandler } from '../../lib/handler';
import { pathParam, queryParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * GET /households/{householdId}/locations
 * Locations sorted by name; `?search=` narrows to matching name or description
 */
export const handler = createHandler('listLocations', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const search = queryParam(event, 'search');

  const locations =
    search !== undefined
      ? await services.locationService.searchLocations(claims, householdId, search)
      : await services.locationService.getLocationsByHousehold(claims, householdId);
  return okResponse(locations);
});
