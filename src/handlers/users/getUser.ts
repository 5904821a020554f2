import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { okResponse } from '../../lib/response';

/**
 * GET /users/{userId}
 */
export const handler = createHandler('getUser', async ({ event, claims, services }) => {
  const userId = pathParam(event, 'userId');
  const user = await services.userService.getUser(claims, userId);
  return okResponse(user);
});
