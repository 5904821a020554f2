import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { noContentResponse } from '../../lib/response';

/**
 * POST /households/{householdId}/leave
 */
export const handler = createHandler('leaveHousehold', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  await services.householdService.leaveHousehold(claims, householdId);
  return noContentResponse();
});
