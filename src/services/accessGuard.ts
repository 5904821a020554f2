import { ForbiddenError, InsufficientPermissionError } from '../lib/errors';
import type { HouseholdMemberRepository } from '../repositories/types';
import type { HouseholdMember, HouseholdRole, User } from '../types/entities';

/**
 * Outcome of an authorization check. `membership` is null for checks that
 * only look at the global role.
 */
export type AccessDecision =
  | { outcome: 'allowed'; membership: HouseholdMember | null }
  | { outcome: 'forbidden'; reason: string }
  | { outcome: 'insufficient_permission'; reason: string };

/**
 * AccessGuard
 * The one place that decides whether a user may act on a household or on the catalog
 */
export class AccessGuard {
  constructor(private readonly members: HouseholdMemberRepository) {}

  async authorize(user: User, householdId: string): Promise<AccessDecision> {
    const membership = await this.members.findByHouseholdIdAndUserId(householdId, user.id);
    if (!membership) {
      return { outcome: 'forbidden', reason: 'Access denied to this household' };
    }
    return { outcome: 'allowed', membership };
  }

  async authorizeHouseholdRole(
    user: User,
    householdId: string,
    roles: readonly HouseholdRole[]
  ): Promise<AccessDecision> {
    const decision = await this.authorize(user, householdId);
    if (decision.outcome !== 'allowed' || decision.membership === null) {
      return decision;
    }
    if (!roles.includes(decision.membership.role)) {
      return {
        outcome: 'insufficient_permission',
        reason: `Household role ${roles.join(' or ')} required`,
      };
    }
    return decision;
  }

  authorizeElevated(user: User, operation: string): AccessDecision {
    if (user.role !== 'ADMIN') {
      return {
        outcome: 'insufficient_permission',
        reason: `Admin role required to ${operation}`,
      };
    }
    return { outcome: 'allowed', membership: null };
  }

  enforce(decision: AccessDecision): HouseholdMember | null {
    switch (decision.outcome) {
      case 'allowed':
        return decision.membership;
      case 'forbidden':
        throw new ForbiddenError(decision.reason);
      case 'insufficient_permission':
        throw new InsufficientPermissionError(decision.reason);
    }
  }

  async requireMember(user: User, householdId: string): Promise<HouseholdMember> {
    return this.requireMembership(await this.authorize(user, householdId));
  }

  async requireHouseholdRole(
    user: User,
    householdId: string,
    roles: readonly HouseholdRole[]
  ): Promise<HouseholdMember> {
    return this.requireMembership(await this.authorizeHouseholdRole(user, householdId, roles));
  }

  requireAdmin(user: User, operation: string): void {
    this.enforce(this.authorizeElevated(user, operation));
  }

  private requireMembership(decision: AccessDecision): HouseholdMember {
    const membership = this.enforce(decision);
    if (!membership) {
      throw new ForbiddenError('Access denied to this household');
    }
    return membership;
  }
}
