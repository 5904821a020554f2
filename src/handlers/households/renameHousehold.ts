import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { HouseholdRequestSchema } from '../../types/schemas';

/**
 * PUT /households/{householdId}
 * Household owners and admins only
 */
export const handler = createHandler('renameHousehold', async ({ event, claims, services }) => {
  const householdId = pathParam(event, 'householdId');
  const request = readBody(event, HouseholdRequestSchema);

  const household = await services.householdService.renameHousehold(claims, householdId, request);
  return okResponse(household, 'Household updated successfully');
});
