import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { TransferOwnershipSchema } from '../../types/schemas';

/**
 * POST /households/{householdId}/transfer-ownership
 */
export const handler = createHandler('transferOwnership', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const request = readBody(event, TransferOwnershipSchema);

  const household = await services.householdService.transferOwnership(claims, householdId, request);
  return okResponse(household, 'Ownership transferred successfully');
});
