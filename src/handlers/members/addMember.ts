import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { createdResponse } from '../../lib/response';
import { AddMemberSchema } from '../../types/schemas';

/**
 * POST /households/{householdId}/members
 * Household owners and admins only
 */
export const handler = createHandler('addMember', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const request = readBody(event, AddMemberSchema);

  const member = await services.householdMemberService.addMember(claims, householdId, request);
  return createdResponse(member, 'Member added successfully');
});
