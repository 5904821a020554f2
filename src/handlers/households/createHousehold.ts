import { createHandler } from '../../lib/handler';
import { readBody } from '../../lib/request';
import { createdResponse } from '../../lib/response';
import { HouseholdRequestSchema } from '../../types/schemas';

/**
 * POST /households
 * The caller becomes the household owner
 */
export const handler = createHandler('createHousehold', async ({ event, claims, services }) => {
  const request = readBody(event, HouseholdRequestSchema);
  const household = await services.householdService.createHousehold(claims, request);
  return createdResponse(household, 'Household created successfully');
});
