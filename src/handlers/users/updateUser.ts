import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { UpdateUserSchema } from '../../types/schemas';

/**
 * PUT /users/{userId}
 * Only the user themself may update the profile; the username is fixed
 */
export const handler = createHandler('updateUser', async ({ event, claims, services, logger }) => {
  const userId = pathParam(event, 'userId');
  const request = readBody(event, UpdateUserSchema);

  const user = await services.userService.updateUser(claims, userId, request);
  logger.info('User profile updated', { userId });
  return okResponse(user, 'User updated successfully');
});
