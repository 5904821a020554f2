import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * GET /households/{householdId}
 */
export const handler = createHandler('getHousehold', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const household = await services.householdService.getHousehold(claims, householdId);
  return okResponse(household);
});
