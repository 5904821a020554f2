import { createHandler } from '../../lib/handler';
import { pathParam } from '../../lib/request';
import { noContentResponse } from '../../lib/response';

/**
 * DELETE /users/{userId}
 */
export const handler = createHandler('deleteUser', async ({ event, claims, services, logger }) => {
  const userId = pathParam(event, 'userId');
  await services.userService.deleteUser(claims, userId);
  logger.info('User profile deleted', { userId });
  return noContentResponse();
});
