import { createHandler } from '../../lib/handler';
import { okResponse } from '../../lib/response';

/**
 * GET /households
 * Households the caller belongs to, with the caller's role in each
 */
export const handler = createHandler('listHouseholds', async ({ claims, services }) => {
  const households = await services.householdService.getCurrentUserHouseholds(claims);
  return okResponse(households);
});
