import { logger } from '../lib/logger';
import {
  BusinessRuleViolationError,
  ConflictError,
  InsufficientPermissionError,
  NotFoundError,
  ValidationError,
} from '../lib/errors';
import { withDataIntegrity } from '../lib/persistence';
import { parseRequest, requireText } from '../lib/validation';
import type { TokenClaims } from '../lib/auth';
import type { HouseholdMemberRepository, HouseholdRepository, UserRepository } from '../repositories/types';
import type { Household, HouseholdMember, HouseholdRole } from '../types/entities';
import { HouseholdMemberResponse, toHouseholdMemberResponse } from '../types/dto';
import {
  AddMemberRequest,
  AddMemberSchema,
  MemberRoleUpdateRequest,
  MemberRoleUpdateSchema,
} from '../types/schemas';
import type { AccessGuard } from './accessGuard';
import type { IdentityResolver } from './identityResolver';

const MANAGER_ROLES: readonly HouseholdRole[] = ['OWNER', 'ADMIN'];

export interface HouseholdMemberServiceDeps {
  households: HouseholdRepository;
  members: HouseholdMemberRepository;
  users: UserRepository;
  identityResolver: IdentityResolver;
  accessGuard: AccessGuard;
}

/**
 * HouseholdMemberService
 * Membership management inside one household. Owners and admins manage members;
 * ownership itself only moves through HouseholdService.transferOwnership.
 */
export class HouseholdMemberService {
  private readonly households: HouseholdRepository;
  private readonly members: HouseholdMemberRepository;
  private readonly users: UserRepository;
  private readonly identityResolver: IdentityResolver;
  private readonly accessGuard: AccessGuard;

  constructor(deps: HouseholdMemberServiceDeps) {
    this.households = deps.households;
    this.members = deps.members;
    this.users = deps.users;
    this.identityResolver = deps.identityResolver;
    this.accessGuard = deps.accessGuard;
  }

  async addMember(
    claims: TokenClaims,
    householdId: string,
    request: AddMemberRequest
  ): Promise<HouseholdMemberResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const { userId, role } = parseRequest(AddMemberSchema, request);
    this.rejectOwnerRole(role);
    const household = await this.requireHousehold(householdId);
    await this.accessGuard.requireHouseholdRole(user, household.id, MANAGER_ROLES);

    const newcomer = await this.users.findById(userId);
    if (!newcomer) {
      throw new NotFoundError('User', userId);
    }
    if (await this.members.findByHouseholdIdAndUserId(household.id, newcomer.id)) {
      throw new ConflictError('User is already a member of this household');
    }

    const member = await withDataIntegrity(
      'add household member',
      () => this.members.create({ householdId: household.id, userId: newcomer.id, role }),
      { householdId: household.id, userId: newcomer.id }
    );
    logger.info('Household member added', {
      householdId: household.id,
      memberUserId: newcomer.id,
      role,
      userId: user.id,
    });
    return toHouseholdMemberResponse(member, household, newcomer);
  }

  async getHouseholdMembers(claims: TokenClaims, householdId: string): Promise<HouseholdMemberResponse[]> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const household = await this.requireHousehold(householdId);
    await this.accessGuard.requireMember(user, household.id);

    const members = await this.members.findByHouseholdId(household.id);
    return Promise.all(members.map((member) => this.toResponse(member, household)));
  }

  async getMember(claims: TokenClaims, householdId: string, memberId: string): Promise<HouseholdMemberResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const household = await this.requireHousehold(householdId);
    await this.accessGuard.requireMember(user, household.id);

    return this.toResponse(await this.requireMember(household, memberId), household);
  }

  /**
   * Owners can remove anyone but themselves; admins cannot remove other admins
   */
  async removeMember(claims: TokenClaims, householdId: string, memberId: string): Promise<void> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const household = await this.requireHousehold(householdId);
    const caller = await this.accessGuard.requireHouseholdRole(user, household.id, MANAGER_ROLES);
    const target = await this.requireMember(household, memberId);

    if (target.role === 'OWNER') {
      throw new BusinessRuleViolationError('Cannot remove the owner from the household');
    }
    if (caller.role === 'ADMIN' && target.role === 'ADMIN') {
      throw new InsufficientPermissionError('Admin cannot remove another admin');
    }

    await withDataIntegrity('remove household member', () => this.members.delete(target), {
      householdId: household.id,
      memberId: target.id,
    });
    logger.info('Household member removed', {
      householdId: household.id,
      memberUserId: target.userId,
      userId: user.id,
    });
  }

  async updateMemberRole(
    claims: TokenClaims,
    householdId: string,
    memberId: string,
    request: MemberRoleUpdateRequest
  ): Promise<HouseholdMemberResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const { role } = parseRequest(MemberRoleUpdateSchema, request);
    this.rejectOwnerRole(role);
    const household = await this.requireHousehold(householdId);
    const caller = await this.accessGuard.requireHouseholdRole(user, household.id, MANAGER_ROLES);
    const target = await this.requireMember(household, memberId);

    if (target.role === 'OWNER') {
      throw new BusinessRuleViolationError("Cannot change the owner's role. Transfer ownership instead");
    }
    if (caller.role === 'ADMIN' && target.role === 'ADMIN') {
      throw new InsufficientPermissionError("Admin cannot change another admin's role");
    }

    const saved = await withDataIntegrity(
      'save household member',
      () => this.members.save({ ...target, role }),
      { householdId: household.id, memberId: target.id }
    );
    logger.info('Household member role changed', {
      householdId: household.id,
      memberUserId: saved.userId,
      from: target.role,
      to: role,
      userId: user.id,
    });
    return this.toResponse(saved, household);
  }

  private rejectOwnerRole(role: HouseholdRole): void {
    if (role === 'OWNER') {
      throw new ValidationError('Cannot assign the OWNER role. Transfer ownership instead', 'role');
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

  // Members are addressed through their household, so one from elsewhere is simply not found
  private async requireMember(household: Household, memberId: string): Promise<HouseholdMember> {
    const id = requireText(memberId, 'memberId', 'Member ID');
    const member = (await this.members.findByHouseholdId(household.id)).find((m) => m.id === id);
    if (!member) {
      throw new NotFoundError('HouseholdMember', id);
    }
    return member;
  }

  private async toResponse(member: HouseholdMember, household: Household): Promise<HouseholdMemberResponse> {
    return toHouseholdMemberResponse(member, household, await this.users.findById(member.userId));
  }
}
