import { logger } from '../lib/logger';
import { BusinessRuleViolationError, NotFoundError, ValidationError, toError } from '../lib/errors';
import { withDataIntegrity } from '../lib/persistence';
import { parseRequest, requireText } from '../lib/validation';
import type { TokenClaims } from '../lib/auth';
import type {
  HouseholdMemberRepository,
  HouseholdRepository,
  LocationRepository,
} from '../repositories/types';
import type { Household, HouseholdRole } from '../types/entities';
import { HouseholdResponse, toHouseholdResponse } from '../types/dto';
import {
  HouseholdRequest,
  HouseholdRequestSchema,
  PatchSchema,
  TransferOwnershipRequest,
  TransferOwnershipSchema,
} from '../types/schemas';
import type { AccessGuard } from './accessGuard';
import type { IdentityResolver } from './identityResolver';

const RENAME_ROLES: readonly HouseholdRole[] = ['OWNER', 'ADMIN'];
const OWNER_ONLY: readonly HouseholdRole[] = ['OWNER'];

export interface HouseholdServiceDeps {
  households: HouseholdRepository;
  members: HouseholdMemberRepository;
  locations: LocationRepository;
  identityResolver: IdentityResolver;
  accessGuard: AccessGuard;
}

/**
 * HouseholdService
 * Business logic for households and the caller's memberships
 */
export class HouseholdService {
  private readonly households: HouseholdRepository;
  private readonly members: HouseholdMemberRepository;
  private readonly locations: LocationRepository;
  private readonly identityResolver: IdentityResolver;
  private readonly accessGuard: AccessGuard;

  constructor(deps: HouseholdServiceDeps) {
    this.households = deps.households;
    this.members = deps.members;
    this.locations = deps.locations;
    this.identityResolver = deps.identityResolver;
    this.accessGuard = deps.accessGuard;
  }

  /**
   * Create a household with the caller as its owner
   */
  async createHousehold(claims: TokenClaims, request: HouseholdRequest): Promise<HouseholdResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const { name } = parseRequest(HouseholdRequestSchema, request);

    const household = await withDataIntegrity('create household', () => this.households.create({ name }));
    try {
      await withDataIntegrity(
        'add household owner',
        () => this.members.create({ householdId: household.id, userId: user.id, role: 'OWNER' }),
        { householdId: household.id, userId: user.id }
      );
    } catch (error) {
      await this.discardOwnerlessHousehold(household);
      throw error;
    }

    logger.info('Household created with owner', { householdId: household.id, userId: user.id });
    return toHouseholdResponse(household, 'OWNER');
  }

  async getHousehold(claims: TokenClaims, householdId: string): Promise<HouseholdResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const household = await this.requireHousehold(householdId);
    const membership = await this.accessGuard.requireMember(user, household.id);
    return toHouseholdResponse(household, membership.role);
  }

  async getCurrentUserHouseholds(claims: TokenClaims): Promise<HouseholdResponse[]> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const memberships = await this.members.findByUserId(user.id);

    const responses: HouseholdResponse[] = [];
    for (const membership of memberships) {
      const household = await this.households.findById(membership.householdId);
      if (!household) {
        logger.warn('Membership references a missing household', {
          householdId: membership.householdId,
          userId: user.id,
        });
        continue;
      }
      responses.push(toHouseholdResponse(household, membership.role));
    }
    return responses.sort((a, b) => a.name.localeCompare(b.name));
  }

  async renameHousehold(
    claims: TokenClaims,
    householdId: string,
    request: HouseholdRequest
  ): Promise<HouseholdResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const { name } = parseRequest(HouseholdRequestSchema, request);
    const household = await this.requireHousehold(householdId);
    const membership = await this.accessGuard.requireHouseholdRole(user, household.id, RENAME_ROLES);

    const saved = await withDataIntegrity(
      'save household',
      () => this.households.save({ ...household, name }),
      { householdId: household.id }
    );
    logger.info('Household renamed', { householdId: saved.id, userId: user.id });
    return toHouseholdResponse(saved, membership.role);
  }

  /**
   * Sparse update. Only `name` is recognised; other keys are ignored.
   */
  async patchHousehold(
    claims: TokenClaims,
    householdId: string,
    patch: Record<string, unknown>
  ): Promise<HouseholdResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const fields = parseRequest(PatchSchema, patch);
    if (Object.keys(fields).length === 0) {
      throw new ValidationError('Patch data cannot be empty');
    }
    const name = 'name' in fields ? parseRequest(HouseholdRequestSchema, { name: fields['name'] }).name : undefined;

    const household = await this.requireHousehold(householdId);
    const membership = await this.accessGuard.requireHouseholdRole(user, household.id, RENAME_ROLES);
    if (name === undefined) {
      return toHouseholdResponse(household, membership.role);
    }

    const saved = await withDataIntegrity(
      'save household',
      () => this.households.save({ ...household, name }),
      { householdId: household.id }
    );
    logger.info('Household patched', { householdId: saved.id, fields: ['name'], userId: user.id });
    return toHouseholdResponse(saved, membership.role);
  }

  /**
   * Owner only. Locations and memberships go with the household.
   */
  async deleteHousehold(claims: TokenClaims, householdId: string): Promise<void> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const household = await this.requireHousehold(householdId);
    await this.accessGuard.requireHouseholdRole(user, household.id, OWNER_ONLY);

    const context = { householdId: household.id };
    for (const location of await this.locations.findByHouseholdId(household.id)) {
      await withDataIntegrity('delete location', () => this.locations.delete(location), context);
    }
    await withDataIntegrity('delete household', () => this.households.delete(household), context);
    for (const member of await this.members.findByHouseholdId(household.id)) {
      await withDataIntegrity('remove household member', () => this.members.delete(member), context);
    }

    logger.info('Household deleted', { householdId: household.id, userId: user.id });
  }

  async leaveHousehold(claims: TokenClaims, householdId: string): Promise<void> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const household = await this.requireHousehold(householdId);
    const membership = await this.accessGuard.requireMember(user, household.id);
    if (membership.role === 'OWNER') {
      throw new BusinessRuleViolationError('Owner cannot leave a household. Transfer ownership first');
    }

    await withDataIntegrity('remove household member', () => this.members.delete(membership), {
      householdId: household.id,
      userId: user.id,
    });
    logger.info('User left household', { householdId: household.id, userId: user.id });
  }

  /**
   * The current owner steps down to ADMIN and an existing member becomes OWNER
   */
  async transferOwnership(
    claims: TokenClaims,
    householdId: string,
    request: TransferOwnershipRequest
  ): Promise<HouseholdResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const { newOwnerId } = parseRequest(TransferOwnershipSchema, request);
    if (newOwnerId === user.id) {
      throw new ValidationError('You already own this household', 'newOwnerId');
    }
    const household = await this.requireHousehold(householdId);
    const owner = await this.accessGuard.requireHouseholdRole(user, household.id, OWNER_ONLY);

    const successor = await this.members.findByHouseholdIdAndUserId(household.id, newOwnerId);
    if (!successor) {
      throw new NotFoundError('HouseholdMember', newOwnerId);
    }

    const context = { householdId: household.id, userId: user.id, newOwnerId };
    await withDataIntegrity('save household member', () => this.members.save({ ...successor, role: 'OWNER' }), context);
    await withDataIntegrity('save household member', () => this.members.save({ ...owner, role: 'ADMIN' }), context);

    logger.info('Household ownership transferred', context);
    return toHouseholdResponse(household, 'ADMIN');
  }

  private async discardOwnerlessHousehold(household: Household): Promise<void> {
    try {
      await this.households.delete(household);
    } catch (cleanupError) {
      logger.error('Failed to discard household without owner', toError(cleanupError), {
        householdId: household.id,
      });
    }
  }

  private async requireHousehold(householdId: string): Promise<Household> {
    const id = requireText(householdId, 'householdId', 'Household ID');
    const household = await this.households.findById(id);
    if (!household) {
      throw new NotFoundError('Household', id);
    }
    return household;
  }
}
