import { createHandler } from '../../lib/handler';
import { readBody } from '../../lib/request';
import { createdResponse } from '../../lib/response';
import { CreateLocationSchema } from '../../types/schemas';

/**
 * POST /locations
 */
export const handler = createHandler('createLocation', async ({ event, claims, services }) => {
  const request = readBody(event, CreateLocationSchema);
  const location = await services.locationService.createLocation(claims, request);
  return createdResponse(location, 'Location created successfully');
});
