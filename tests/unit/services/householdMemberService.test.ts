/**
 * HouseholdMemberService Unit Tests
 */

import { AccessGuard } from '../../../src/services/accessGuard';
import { HouseholdMemberService } from '../../../src/services/householdMemberService';
import { IdentityResolver } from '../../../src/services/identityResolver';
import {
  BusinessRuleViolationError,
  ConflictError,
  ForbiddenError,
  InsufficientPermissionError,
  NotFoundError,
  ValidationError,
} from '../../../src/lib/errors';
import type { TokenClaims } from '../../../src/lib/auth';
import {
  InMemoryRepositories,
  createInMemoryRepositories,
  resetIds,
} from '../../support/inMemoryRepositories';
import {
  FIXED_NOW,
  admin,
  aliceClaims,
  alice,
  bob,
  bobClaims,
  makeHousehold,
  makeMember,
  makeUser,
} from '../../support/fixtures';

jest.mock('../../../src/lib/logger');

const carol = makeUser({ id: 'user-carol', username: 'carol', email: 'carol@example.com', displayName: 'Carol' });
const carolClaims: TokenClaims = { sub: 'user-carol', email: 'carol@example.com', name: 'Carol' };

const MANAGER_REQUIRED = new InsufficientPermissionError('Household role OWNER or ADMIN required');

describe('HouseholdMemberService', () => {
  let repos: InMemoryRepositories;
  let service: HouseholdMemberService;

  beforeEach(() => {
    resetIds();
    repos = createInMemoryRepositories();
    for (const user of [alice, bob, carol, admin]) {
      repos.users.items.set(user.id, user);
    }
    repos.households.items.set('household-home', makeHousehold());
    repos.households.items.set('household-cabin', makeHousehold({ id: 'household-cabin', name: 'Cabin' }));
    repos.members.items.push(
      makeMember('household-home', alice.id, 'OWNER'),
      makeMember('household-home', bob.id, 'ADMIN'),
      makeMember('household-home', carol.id, 'MEMBER'),
      makeMember('household-cabin', admin.id, 'OWNER')
    );

    service = new HouseholdMemberService({
      households: repos.households,
      members: repos.members,
      users: repos.users,
      identityResolver: new IdentityResolver(repos.users),
      accessGuard: new AccessGuard(repos.members),
    });
  });

  describe('addMember', () => {
    it('should add a user with the requested role', async () => {
      const result = await service.addMember(aliceClaims, 'household-home', { userId: 'user-admin', role: 'VIEWER' });

      expect(result).toEqual({
        id: 'member-1',
        householdId: 'household-home',
        householdName: 'Home',
        userId: 'user-admin',
        username: 'admin',
        role: 'VIEWER',
        createdAt: FIXED_NOW,
      });
      expect(repos.members.items).toHaveLength(5);
    });

    it('should let a household admin add members', async () => {
      await expect(
        service.addMember(bobClaims, 'household-home', { userId: 'user-admin', role: 'MEMBER' })
      ).resolves.toMatchObject({ userId: 'user-admin', role: 'MEMBER' });
    });

    it('should not hand out the owner role', async () => {
      await expect(
        service.addMember(aliceClaims, 'household-home', { userId: 'user-admin', role: 'OWNER' })
      ).rejects.toThrow(new ValidationError('Cannot assign the OWNER role. Transfer ownership instead', 'role'));
      expect(repos.members.items).toHaveLength(4);
    });

    it('should refuse a plain member', async () => {
      await expect(
        service.addMember(carolClaims, 'household-home', { userId: 'user-admin', role: 'MEMBER' })
      ).rejects.toThrow(MANAGER_REQUIRED);
      expect(repos.members.items).toHaveLength(4);
    });

    it('should report an unknown user as not found', async () => {
      await expect(
        service.addMember(aliceClaims, 'household-home', { userId: 'user-ghost', role: 'MEMBER' })
      ).rejects.toThrow(new NotFoundError('User', 'user-ghost'));
    });

    it('should reject a user who already belongs to the household', async () => {
      const createSpy = jest.spyOn(repos.members, 'create');

      await expect(
        service.addMember(aliceClaims, 'household-home', { userId: 'user-carol', role: 'VIEWER' })
      ).rejects.toThrow(new ConflictError('User is already a member of this household'));
      expect(createSpy).not.toHaveBeenCalled();
    });

    it('should report an unknown household as not found', async () => {
      await expect(
        service.addMember(aliceClaims, 'household-missing', { userId: 'user-admin', role: 'MEMBER' })
      ).rejects.toThrow(new NotFoundError('Household', 'household-missing'));
    });
  });

  describe('getHouseholdMembers', () => {
    it('should list every member with their username', async () => {
      const result = await service.getHouseholdMembers(carolClaims, 'household-home');

      expect(result.map((member) => [member.userId, member.username, member.role])).toEqual([
        ['user-alice', 'alice', 'OWNER'],
        ['user-bob', 'bob', 'ADMIN'],
        ['user-carol', 'carol', 'MEMBER'],
      ]);
    });

    it('should leave the username empty when the user record is gone', async () => {
      repos.users.items.delete(bob.id);

      const result = await service.getHouseholdMembers(aliceClaims, 'household-home');

      expect(result[1]).toMatchObject({ userId: 'user-bob', username: null });
    });

    it('should refuse non-members', async () => {
      await expect(service.getHouseholdMembers(carolClaims, 'household-cabin')).rejects.toThrow(ForbiddenError);
    });
  });

  describe('getMember', () => {
    it('should return one membership', async () => {
      await expect(
        service.getMember(bobClaims, 'household-home', 'member-household-home-user-carol')
      ).resolves.toEqual({
        id: 'member-household-home-user-carol',
        householdId: 'household-home',
        householdName: 'Home',
        userId: 'user-carol',
        username: 'carol',
        role: 'MEMBER',
        createdAt: FIXED_NOW,
      });
    });

    it('should not find a membership of another household', async () => {
      await expect(
        service.getMember(aliceClaims, 'household-home', 'member-household-cabin-user-admin')
      ).rejects.toThrow(new NotFoundError('HouseholdMember', 'member-household-cabin-user-admin'));
    });
  });

  describe('removeMember', () => {
    const memberIds = () => repos.members.items.map((member) => member.id);

    it('should let the owner remove an admin', async () => {
      await service.removeMember(aliceClaims, 'household-home', 'member-household-home-user-bob');

      expect(memberIds()).toEqual([
        'member-household-home-user-alice',
        'member-household-home-user-carol',
        'member-household-cabin-user-admin',
      ]);
    });

    it('should let an admin remove a plain member', async () => {
      await service.removeMember(bobClaims, 'household-home', 'member-household-home-user-carol');

      expect(memberIds()).not.toContain('member-household-home-user-carol');
    });

    it('should never remove the owner', async () => {
      await expect(
        service.removeMember(bobClaims, 'household-home', 'member-household-home-user-alice')
      ).rejects.toThrow(new BusinessRuleViolationError('Cannot remove the owner from the household'));
      expect(memberIds()).toHaveLength(4);
    });

    it('should stop an admin removing another admin', async () => {
      repos.members.items.push(makeMember('household-home', 'user-dave', 'ADMIN'));

      await expect(
        service.removeMember(bobClaims, 'household-home', 'member-household-home-user-dave')
      ).rejects.toThrow(new InsufficientPermissionError('Admin cannot remove another admin'));
      expect(memberIds()).toHaveLength(5);
    });

    it('should refuse a plain member', async () => {
      await expect(
        service.removeMember(carolClaims, 'household-home', 'member-household-home-user-bob')
      ).rejects.toThrow(MANAGER_REQUIRED);
    });
  });

  describe('updateMemberRole', () => {
    const roleOf = (id: string) => repos.members.items.find((member) => member.id === id)?.role;

    it('should promote a member', async () => {
      const result = await service.updateMemberRole(aliceClaims, 'household-home', 'member-household-home-user-carol', {
        role: 'ADMIN',
      });

      expect(result).toMatchObject({ id: 'member-household-home-user-carol', username: 'carol', role: 'ADMIN' });
      expect(roleOf('member-household-home-user-carol')).toBe('ADMIN');
    });

    it('should let the owner demote an admin', async () => {
      await service.updateMemberRole(aliceClaims, 'household-home', 'member-household-home-user-bob', {
        role: 'VIEWER',
      });

      expect(roleOf('member-household-home-user-bob')).toBe('VIEWER');
    });

    it('should not hand out the owner role', async () => {
      await expect(
        service.updateMemberRole(aliceClaims, 'household-home', 'member-household-home-user-bob', { role: 'OWNER' })
      ).rejects.toThrow(new ValidationError('Cannot assign the OWNER role. Transfer ownership instead', 'role'));
      expect(roleOf('member-household-home-user-bob')).toBe('ADMIN');
    });

    it("should not change the owner's role", async () => {
      await expect(
        service.updateMemberRole(bobClaims, 'household-home', 'member-household-home-user-alice', { role: 'MEMBER' })
      ).rejects.toThrow(
        new BusinessRuleViolationError("Cannot change the owner's role. Transfer ownership instead")
      );
      expect(roleOf('member-household-home-user-alice')).toBe('OWNER');
    });

    it("should stop an admin changing another admin's role", async () => {
      repos.members.items.push(makeMember('household-home', 'user-dave', 'ADMIN'));

      await expect(
        service.updateMemberRole(bobClaims, 'household-home', 'member-household-home-user-dave', { role: 'VIEWER' })
      ).rejects.toThrow(new InsufficientPermissionError("Admin cannot change another admin's role"));
      expect(roleOf('member-household-home-user-dave')).toBe('ADMIN');
    });

    it('should refuse a plain member', async () => {
      await expect(
        service.updateMemberRole(carolClaims, 'household-home', 'member-household-home-user-carol', {
          role: 'ADMIN',
        })
      ).rejects.toThrow(MANAGER_REQUIRED);
    });
  });
});
