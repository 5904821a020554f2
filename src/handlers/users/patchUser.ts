import { createHandler } from '../../lib/handler';
import { pathParam, readBody } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { PatchSchema } from '../../types/schemas';

/**
 * PATCH /users/{userId}
 */
export const handler = createHandler('patchUser', async ({ event, claims, services }) => {
  const userId = pathParam(event, 'userId');
  const patch = readBody(event, PatchSchema);

  const user = await services.userService.patchUser(claims, userId, patch);
  return okResponse(user, 'User updated successfully');
});
