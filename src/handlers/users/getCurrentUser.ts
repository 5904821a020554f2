import { createHandler } from '../../lib/handler';
import { okResponse } from '../../lib/response';

/**
 * GET /users/me
 * Profile of the caller, created on first request
 */
export const handler = createHandler('getCurrentUser', async ({ claims, services }) => {
  const user = await services.userService.getCurrentUserDetails(claims);
  return okResponse(user);
});
