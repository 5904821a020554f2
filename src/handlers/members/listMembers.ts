import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * GET /households/{householdId}/members
 */
export const handler = createHandler('listMembers', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const members = await services.householdMemberService.getHouseholdMembers(claims, householdId);
  return okResponse(members);
});
