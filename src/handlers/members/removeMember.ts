import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { noContentResponse } from '../../lib/response';

/**
 * DELETE /households/{householdId}/members/{memberId}
 */
export const handler = createHandler('removeMember', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const memberId = pathParam(event, 'memberId');

  await services.householdMemberService.removeMember(claims, householdId, memberId);
  return noContentResponse();
});
