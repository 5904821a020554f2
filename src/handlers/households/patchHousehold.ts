import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { PatchSchema } from '../../types/schemas';

/**
 * PATCH /households/{householdId}
 */
export const handler = createHandler('patchHousehold', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const patch = readBody(event, PatchSchema);

  const household = await services.householdService.patchHousehold(claims, householdId, patch);
  return okResponse(household, 'Household updated successfully');
});
