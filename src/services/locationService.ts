import { logger } from '../lib/logger';
import { ConflictError, NotFoundError, ValidationError } from '../lib/errors';
import { withDataIntegrity } from '../lib/persistence';
import { parseRequest, requireText } from '../lib/validation';
import type { TokenClaims } from '../lib/auth';
import type { HouseholdRepository, LocationRepository } from '../repositories/types';
import type { Household, Location, User } from '../types/entities';
import { LocationResponse, NameAvailability, toLocationResponse } from '../types/dto';
import {
  CreateLocationRequest,
  CreateLocationSchema,
  PatchSchema,
  UpdateLocationRequest,
  UpdateLocationSchema,
} from '../types/schemas';
import type { AccessGuard } from './accessGuard';
import type { IdentityResolver } from './identityResolver';

export interface LocationServiceDeps {
  households: HouseholdRepository;
  locations: LocationRepository;
  identityResolver: IdentityResolver;
  accessGuard: AccessGuard;
}

/**
 * LocationService
 * Named places inside a household. Every operation requires household membership.
 */
export class LocationService {
  private readonly households: HouseholdRepository;
  private readonly locations: LocationRepository;
  private readonly identityResolver: IdentityResolver;
  private readonly accessGuard: AccessGuard;

  constructor(deps: LocationServiceDeps) {
    this.households = deps.households;
    this.locations = deps.locations;
    this.identityResolver = deps.identityResolver;
    this.accessGuard = deps.accessGuard;
  }

  async createLocation(claims: TokenClaims, request: CreateLocationRequest): Promise<LocationResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const { householdId, name, description } = parseRequest(CreateLocationSchema, request);

    const household = await this.requireHousehold(householdId);
    await this.accessGuard.requireMember(user, householdId);
    await this.assertNameAvailable(householdId, name);

    const location = await withDataIntegrity(
      'create location',
      () => this.locations.create({ householdId, name, description: description ?? null }),
      { householdId, name }
    );

    logger.info('Location created', { locationId: location.id, householdId, userId: user.id });
    return toLocationResponse(location, household.name);
  }

  async getLocationById(claims: TokenClaims, locationId: string): Promise<LocationResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const { location, household } = await this.loadAuthorized(user, locationId);
    return toLocationResponse(location, household.name);
  }

  /**
   * All locations of a household, sorted by name
   */
  async getLocationsByHousehold(claims: TokenClaims, householdId: string): Promise<LocationResponse[]> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const id = requireText(householdId, 'householdId', 'Household ID');

    const household = await this.requireHousehold(id);
    await this.accessGuard.requireMember(user, id);

    const locations = await this.locations.findByHouseholdId(id);
    return locations.map((location) => toLocationResponse(location, household.name));
  }

  /**
   * Full update; null or omitted fields keep their current value
   */
  async updateLocation(
    claims: TokenClaims,
    locationId: string,
    request: UpdateLocationRequest
  ): Promise<LocationResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const updates = parseRequest(UpdateLocationSchema, request);
    const { location, household } = await this.loadAuthorized(user, locationId);

    const next: Location = { ...location };
    if (updates.name != null) {
      if (updates.name !== location.name) {
        await this.assertNameAvailable(location.householdId, updates.name);
      }
      next.name = updates.name;
    }
    if (updates.description != null) {
      next.description = updates.description;
    }

    const saved = await this.save(next);
    logger.info('Location updated', { locationId: saved.id, userId: user.id });
    return toLocationResponse(saved, household.name);
  }

  /**
   * Sparse update of `name` and `description`. Other keys are ignored.
   */
  async patchLocation(
    claims: TokenClaims,
    locationId: string,
    patch: Record<string, unknown>
  ): Promise<LocationResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const fields = parseRequest(PatchSchema, patch);
    if (Object.keys(fields).length === 0) {
      throw new ValidationError('Patch data cannot be empty');
    }

    const changes: { name?: string; description?: string | null } = {};
    if ('name' in fields) {
      const name = fields['name'];
      if (typeof name !== 'string' || name.trim().length === 0) {
        throw new ValidationError('Location name must be a non-blank string', 'name');
      }
      changes.name = name.trim();
    }
    if ('description' in fields) {
      const description = fields['description'];
      if (description === null) {
        changes.description = null;
      } else if (typeof description === 'string') {
        changes.description = description.trim();
      } else {
        throw new ValidationError('Description must be a string or null', 'description');
      }
    }

    const { location, household } = await this.loadAuthorized(user, locationId);

    if (changes.name !== undefined && changes.name !== location.name) {
      await this.assertNameAvailable(location.householdId, changes.name);
    }

    const saved = await this.save({ ...location, ...changes });
    logger.info('Location patched', { locationId: saved.id, fields: Object.keys(changes), userId: user.id });
    return toLocationResponse(saved, household.name);
  }

  async deleteLocation(claims: TokenClaims, locationId: string): Promise<void> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const { location } = await this.loadAuthorized(user, locationId);

    await withDataIntegrity('delete location', () => this.locations.delete(location), {
      locationId: location.id,
    });
    logger.info('Location deleted', { locationId: location.id, userId: user.id });
  }

  /**
   * Case-insensitive substring search over name and description
   */
  async searchLocations(
    claims: TokenClaims,
    householdId: string,
    searchTerm: string
  ): Promise<LocationResponse[]> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const id = requireText(householdId, 'householdId', 'Household ID');
    const term = requireText(searchTerm, 'searchTerm', 'Search term');

    const household = await this.requireHousehold(id);
    await this.accessGuard.requireMember(user, id);

    const matches = await this.locations.searchByNameOrDescription(id, term);
    return matches.map((location) => toLocationResponse(location, household.name));
  }

  async isLocationNameAvailable(
    claims: TokenClaims,
    householdId: string,
    name: string
  ): Promise<NameAvailability> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const id = requireText(householdId, 'householdId', 'Household ID');
    const candidate = requireText(name, 'name', 'Location name');

    await this.requireHousehold(id);
    await this.accessGuard.requireMember(user, id);

    const taken = await this.locations.existsByHouseholdIdAndName(id, candidate);
    return { name: candidate, available: !taken };
  }

  private async requireHousehold(householdId: string): Promise<Household> {
    const household = await this.households.findById(householdId);
    if (!household) {
      throw new NotFoundError('Household', householdId);
    }
    return household;
  }

  private async loadAuthorized(
    user: User,
    locationId: string
  ): Promise<{ location: Location; household: Household }> {
    const id = requireText(locationId, 'locationId', 'Location ID');
    const location = await this.locations.findById(id);
    if (!location) {
      throw new NotFoundError('Location', id);
    }

    await this.accessGuard.requireMember(user, location.householdId);
    const household = await this.requireHousehold(location.householdId);
    return { location, household };
  }

  private async assertNameAvailable(householdId: string, name: string): Promise<void> {
    if (await this.locations.existsByHouseholdIdAndName(householdId, name)) {
      throw new ConflictError(`Location with name "${name}" already exists in this household`);
    }
  }

  private save(location: Location): Promise<Location> {
    return withDataIntegrity('save location', () => this.locations.save(location), {
      locationId: location.id,
    });
  }
}
