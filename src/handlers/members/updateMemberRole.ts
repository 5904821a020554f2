import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { MemberRoleUpdateSchema } from '../../types/schemas';

/**
 * PUT /households/{householdId}/members/{memberId}/role
 */
export const handler = createHandler('updateMemberRole', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const memberId = pathParam(event, 'memberId');
  const request = readBody(event, MemberRoleUpdateSchema);

  const member = await services.householdMemberService.updateMemberRole(claims, householdId, memberId, request);
  return okResponse(member, 'Member role updated successfully');
});
