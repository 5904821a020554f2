import { logger } from '../lib/logger';
import {
  ConflictError,
  ForbiddenError,
  InsufficientPermissionError,
  NotFoundError,
  ValidationError,
} from '../lib/errors';
import { withDataIntegrity } from '../lib/persistence';
import { parseRequest, requireText } from '../lib/validation';
import type { TokenClaims } from '../lib/auth';
import type { HouseholdMemberRepository, UserRepository } from '../repositories/types';
import type { User } from '../types/entities';
import { UserResponse, toUserResponse } from '../types/dto';
import { PatchSchema, UpdateUserRequest, UpdateUserSchema } from '../types/schemas';
import type { IdentityResolver } from './identityResolver';

const PATCHABLE_FIELDS = ['displayName', 'email'] as const;

export interface UserServiceDeps {
  users: UserRepository;
  members: HouseholdMemberRepository;
  identityResolver: IdentityResolver;
}

/**
 * UserService
 * Profiles are visible to their owner and to users sharing a household,
 * and only the owner may change or delete one.
 */
export class UserService {
  private readonly users: UserRepository;
  private readonly members: HouseholdMemberRepository;
  private readonly identityResolver: IdentityResolver;

  constructor(deps: UserServiceDeps) {
    this.users = deps.users;
    this.members = deps.members;
    this.identityResolver = deps.identityResolver;
  }

  async getCurrentUserDetails(claims: TokenClaims): Promise<UserResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    return this.toResponse(user);
  }

  async getUser(claims: TokenClaims, userId: string): Promise<UserResponse> {
    const current = await this.identityResolver.resolveCurrentUser(claims);
    const id = requireText(userId, 'userId', 'User ID');
    const target = await this.users.findById(id);
    if (!target) {
      throw new NotFoundError('User', id);
    }
    await this.assertVisible(current, target);
    return this.toResponse(target);
  }

  async getUserByUsername(claims: TokenClaims, username: string): Promise<UserResponse> {
    const current = await this.identityResolver.resolveCurrentUser(claims);
    const name = requireText(username, 'username', 'Username');
    const target = await this.users.findByUsername(name);
    if (!target) {
      throw new NotFoundError('User');
    }
    await this.assertVisible(current, target);
    return this.toResponse(target);
  }

  /**
   * Full profile update. The username is fixed at creation and cannot change.
   */
  async updateUser(claims: TokenClaims, userId: string, request: UpdateUserRequest): Promise<UserResponse> {
    const current = await this.identityResolver.resolveCurrentUser(claims);
    const updates = parseRequest(UpdateUserSchema, request);
    this.assertSelf(current, userId, 'update');

    if (updates.username != null && updates.username !== current.username) {
      throw new ValidationError('Username cannot be changed', 'username');
    }

    const next: User = { ...current };
    if (updates.displayName != null) {
      next.displayName = updates.displayName;
    }
    if (updates.email != null && updates.email !== current.email) {
      await this.assertEmailAvailable(current, updates.email);
      next.email = updates.email;
    }

    const saved = await this.save(next);
    logger.info('User updated', { userId: saved.id });
    return this.toResponse(saved);
  }

  /**
   * Sparse update of displayName and email. Unknown keys are ignored.
   */
  async patchUser(claims: TokenClaims, userId: string, patch: Record<string, unknown>): Promise<UserResponse> {
    const current = await this.identityResolver.resolveCurrentUser(claims);
    const fields = parseRequest(PatchSchema, patch);
    if (Object.keys(fields).length === 0) {
      throw new ValidationError('Patch data cannot be empty');
    }
    if ('username' in fields) {
      throw new ValidationError('Username cannot be changed', 'username');
    }
    this.assertSelf(current, userId, 'update');

    const picked: Record<string, unknown> = {};
    for (const field of PATCHABLE_FIELDS) {
      if (field in fields) {
        picked[field] = fields[field];
      }
    }
    const updates = parseRequest(UpdateUserSchema, picked);

    const next: User = { ...current };
    if (updates.displayName != null) {
      next.displayName = updates.displayName;
    }
    if (updates.email != null && updates.email !== current.email) {
      await this.assertEmailAvailable(current, updates.email);
      next.email = updates.email;
    }

    const saved = await this.save(next);
    logger.info('User patched', { userId: saved.id, fields: Object.keys(picked) });
    return this.toResponse(saved);
  }

  async deleteUser(claims: TokenClaims, userId: string): Promise<void> {
    const current = await this.identityResolver.resolveCurrentUser(claims);
    this.assertSelf(current, userId, 'delete');

    await withDataIntegrity('delete user', () => this.users.delete(current), { userId: current.id });
    logger.info('User deleted', { userId: current.id });
  }

  private assertSelf(current: User, userId: string, action: string): void {
    const id = requireText(userId, 'userId', 'User ID');
    if (id !== current.id) {
      throw new ForbiddenError(`You can only ${action} your own profile`);
    }
  }

  /**
   * Another user's profile is visible when the two share at least one household
   */
  private async assertVisible(current: User, target: User): Promise<void> {
    if (current.id === target.id) {
      return;
    }
    const [own, theirs] = await Promise.all([
      this.members.findByUserId(current.id),
      this.members.findByUserId(target.id),
    ]);
    const ownHouseholds = new Set(own.map((membership) => membership.householdId));
    if (!theirs.some((membership) => ownHouseholds.has(membership.householdId))) {
      throw new InsufficientPermissionError('You do not have permission to access this user profile');
    }
  }

  private async assertEmailAvailable(current: User, email: string): Promise<void> {
    const holder = await this.users.findByEmail(email);
    if (holder && holder.id !== current.id) {
      throw new ConflictError(`Email "${email}" is already in use by another user`);
    }
  }

  private save(user: User): Promise<User> {
    return withDataIntegrity('save user', () => this.users.save(user), { userId: user.id });
  }

  private async toResponse(user: User): Promise<UserResponse> {
    const memberships = await this.members.findByUserId(user.id);
    return toUserResponse(
      user,
      memberships.map((membership) => membership.householdId)
    );
  }
}
