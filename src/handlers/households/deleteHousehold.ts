import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { noContentResponse } from '../../lib/response';

/**
 * DELETE /households/{householdId}
 * Owner only; removes the household's locations and memberships too
 */
export const handler = createHandler('deleteHousehold', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  await services.householdService.deleteHousehold(claims, householdId);
  return noContentResponse();
});
