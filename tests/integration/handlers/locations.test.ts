/**
 * Integration Tests for location handlers
 * Handlers run against the real services over in-memory repositories.
 */

import { handler as createLocation } from '../../../src/handlers/locations/createLocation';
import { handler as getLocation } from '../../../src/handlers/locations/getLocation';
import { handler as listLocations } from '../../../src/handlers/locations/listLocations';
import { handler as checkLocationName } from '../../../src/handlers/locations/checkLocationName';
import { handler as updateLocation } from '../../../src/handlers/locations/updateLocation';
import { handler as patchLocation } from '../../../src/handlers/locations/patchLocation';
import { handler as deleteLocation } from '../../../src/handlers/locations/deleteLocation';
import { getServiceContainer } from '../../../src/lib/container';
import { TestContainer, buildTestContainer, parseBody } from '../../support/container';
import { buildContext, buildEvent } from '../../support/events';
import {
  FIXED_NOW,
  alice,
  aliceClaims,
  bobClaims,
  makeHousehold,
  makeLocation,
  makeMember,
} from '../../support/fixtures';

jest.mock('../../../src/lib/logger');
jest.mock('../../../src/lib/container', () => ({
  ...jest.requireActual<typeof import('../../../src/lib/container')>('../../../src/lib/container'),
  getServiceContainer: jest.fn(),
}));

describe('location handlers', () => {
  let container: TestContainer;

  beforeEach(() => {
    container = buildTestContainer();
    const { repos } = container;
    repos.users.items.set(alice.id, alice);
    repos.households.items.set('household-home', makeHousehold());
    repos.members.items.push(makeMember('household-home', alice.id, 'OWNER'));
    repos.locations.items.set('location-kitchen', makeLocation());
    repos.locations.items.set(
      'location-freezer',
      makeLocation({ id: 'location-freezer', name: 'Freezer', description: 'Garage chest freezer' })
    );
    jest.mocked(getServiceContainer).mockReturnValue(container.services);
  });

  describe('POST /locations', () => {
    it('should create a location and answer 201', async () => {
      const result = await createLocation(
        buildEvent({
          claims: aliceClaims,
          httpMethod: 'POST',
          body: { householdId: 'household-home', name: 'Pantry', description: 'Under the stairs' },
        }),
        buildContext()
      );

      expect(result.statusCode).toBe(201);
      expect(parseBody(result)).toEqual({
        data: {
          id: 'location-1',
          householdId: 'household-home',
          householdName: 'Home',
          name: 'Pantry',
          description: 'Under the stairs',
          createdAt: FIXED_NOW,
          updatedAt: FIXED_NOW,
        },
        message: 'Location created successfully',
      });
    });

    it('should answer 401 without a token', async () => {
      const result = await createLocation(
        buildEvent({ httpMethod: 'POST', body: { householdId: 'household-home', name: 'Pantry' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(401);
      expect(parseBody(result)).toEqual({ error: { code: 'UNAUTHORIZED', message: 'Authentication required' } });
    });

    it('should answer 400 for a missing body', async () => {
      const result = await createLocation(buildEvent({ claims: aliceClaims, httpMethod: 'POST' }), buildContext());

      expect(result.statusCode).toBe(400);
      expect(parseBody(result)).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Request body is required', details: { field: 'body' } },
      });
    });

    it('should answer 403 for a caller outside the household', async () => {
      const result = await createLocation(
        buildEvent({ claims: bobClaims, httpMethod: 'POST', body: { householdId: 'household-home', name: 'Pantry' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(403);
      expect(parseBody(result)).toEqual({
        error: { code: 'FORBIDDEN', message: 'Access denied to this household' },
      });
    });

    it('should answer 409 for a duplicate name', async () => {
      const result = await createLocation(
        buildEvent({ claims: aliceClaims, httpMethod: 'POST', body: { householdId: 'household-home', name: 'Kitchen' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(409);
    });
  });

  describe('GET /locations/{locationId}', () => {
    it('should return the location', async () => {
      const result = await getLocation(
        buildEvent({ claims: aliceClaims, pathParameters: { locationId: 'location-kitchen' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(200);
      expect(parseBody(result)).toMatchObject({ data: { id: 'location-kitchen', householdName: 'Home' } });
    });

    it('should answer 404 for an unknown location', async () => {
      const result = await getLocation(
        buildEvent({ claims: aliceClaims, pathParameters: { locationId: 'location-missing' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(404);
      expect(parseBody(result)).toEqual({
        error: {
          code: 'NOT_FOUND',
          message: 'Location with ID "location-missing" not found',
          details: { entityType: 'Location', entityId: 'location-missing' },
        },
      });
    });
  });

  describe('GET /households/{householdId}/locations', () => {
    it('should list locations sorted by name', async () => {
      const result = await listLocations(
        buildEvent({ claims: aliceClaims, pathParameters: { householdId: 'household-home' } }),
        buildContext()
      );

      expect(parseBody(result)).toMatchObject({ data: [{ name: 'Freezer' }, { name: 'Kitchen' }] });
    });

    it('should narrow the list with ?search=', async () => {
      const result = await listLocations(
        buildEvent({
          claims: aliceClaims,
          pathParameters: { householdId: 'household-home' },
          queryStringParameters: { search: 'garage' },
        }),
        buildContext()
      );

      expect(parseBody(result)).toMatchObject({ data: [{ id: 'location-freezer' }] });
    });
  });

  describe('GET /households/{householdId}/locations/check-name', () => {
    it('should report a taken name', async () => {
      const result = await checkLocationName(
        buildEvent({
          claims: aliceClaims,
          pathParameters: { householdId: 'household-home' },
          queryStringParameters: { name: 'Kitchen' },
        }),
        buildContext()
      );

      expect(parseBody(result)).toEqual({ data: { name: 'Kitchen', available: false } });
    });

    it('should answer 400 without a name', async () => {
      const result = await checkLocationName(
        buildEvent({ claims: aliceClaims, pathParameters: { householdId: 'household-home' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(400);
      expect(parseBody(result)).toMatchObject({ error: { message: 'Location name cannot be null or empty' } });
    });
  });

  describe('updates', () => {
    it('should apply a full update', async () => {
      const result = await updateLocation(
        buildEvent({
          claims: aliceClaims,
          httpMethod: 'PUT',
          pathParameters: { locationId: 'location-kitchen' },
          body: { name: 'Main Kitchen', description: 'Ground floor' },
        }),
        buildContext()
      );

      expect(result.statusCode).toBe(200);
      expect(parseBody(result)).toMatchObject({
        data: { name: 'Main Kitchen', description: 'Ground floor' },
        message: 'Location updated successfully',
      });
    });

    it('should apply a patch', async () => {
      const result = await patchLocation(
        buildEvent({
          claims: aliceClaims,
          httpMethod: 'PATCH',
          pathParameters: { locationId: 'location-freezer' },
          body: { description: null },
        }),
        buildContext()
      );

      expect(parseBody(result)).toMatchObject({ data: { name: 'Freezer', description: null } });
    });

    it('should answer 400 for a patch body that is not an object', async () => {
      const result = await patchLocation(
        buildEvent({
          claims: aliceClaims,
          httpMethod: 'PATCH',
          pathParameters: { locationId: 'location-freezer' },
          body: '["name"]',
        }),
        buildContext()
      );

      expect(result.statusCode).toBe(400);
    });
  });

  describe('DELETE /locations/{locationId}', () => {
    it('should answer 204 and remove the location', async () => {
      const result = await deleteLocation(
        buildEvent({ claims: aliceClaims, httpMethod: 'DELETE', pathParameters: { locationId: 'location-kitchen' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(204);
      expect(result.body).toBe('');
      expect(container.repos.locations.items.has('location-kitchen')).toBe(false);
    });
  });
});
