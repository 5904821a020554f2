/**
 * Shared test data
 */

import type { TokenClaims } from '../../src/lib/auth';
import type { Household, HouseholdMember, HouseholdRole, Location, Product, User } from '../../src/types/entities';

export const FIXED_NOW = '2026-01-15T10:00:00.000Z';
export const fixedClock = (): Date => new Date(FIXED_NOW);

export const aliceClaims: TokenClaims = { sub: 'user-alice', email: 'alice@example.com', name: 'Alice' };
export const bobClaims: TokenClaims = { sub: 'user-bob', email: 'bob@example.com', name: 'Bob' };
export const adminClaims: TokenClaims = { sub: 'user-admin', email: 'admin@example.com', name: 'Admin' };

export const makeUser = (overrides: Partial<User> = {}): User => ({
  id: 'user-alice',
  username: 'alice',
  email: 'alice@example.com',
  displayName: 'Alice',
  role: 'USER',
  createdAt: FIXED_NOW,
  updatedAt: FIXED_NOW,
  ...overrides,
});

export const alice = makeUser();
export const bob = makeUser({ id: 'user-bob', username: 'bob', email: 'bob@example.com', displayName: 'Bob' });
export const admin = makeUser({
  id: 'user-admin',
  username: 'admin',
  email: 'admin@example.com',
  displayName: 'Admin',
  role: 'ADMIN',
});

export const makeHousehold = (overrides: Partial<Household> = {}): Household => ({
  id: 'household-home',
  name: 'Home',
  createdAt: FIXED_NOW,
  updatedAt: FIXED_NOW,
  ...overrides,
});

export const makeMember = (
  householdId: string,
  userId: string,
  role: HouseholdRole = 'MEMBER'
): HouseholdMember => ({
  id: `member-${householdId}-${userId}`,
  householdId,
  userId,
  role,
  createdAt: FIXED_NOW,
  updatedAt: FIXED_NOW,
});

export const makeLocation = (overrides: Partial<Location> = {}): Location => ({
  id: 'location-kitchen',
  householdId: 'household-home',
  name: 'Kitchen',
  description: null,
  createdAt: FIXED_NOW,
  updatedAt: FIXED_NOW,
  ...overrides,
});

export const makeProduct = (overrides: Partial<Product> = {}): Product => ({
  id: 'product-nutella',
  upc: '3017624010701',
  name: 'Nutella',
  brand: 'Ferrero',
  category: 'Spreads',
  defaultExpirationDays: null,
  dataSource: 'EXTERNAL_API',
  requiresApiRetry: false,
  retryAttempts: 0,
  lastRetryAttempt: null,
  createdAt: FIXED_NOW,
  updatedAt: FIXED_NOW,
  ...overrides,
});
