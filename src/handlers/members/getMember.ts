import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * GET /households/{householdId}/members/{memberId}
 */
export const handler = createHandler('getMember', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const memberId = pathParam(event, 'memberId');

  const member = await services.householdMemberService.getMember(claims, householdId, memberId);
  return okResponse(member);
});
