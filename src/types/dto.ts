/**
 * Response shapes returned by the services and serialized by the handlers
 */

import type {
  Household,
  HouseholdMember,
  HouseholdRole,
  Location,
  Product,
  ProductDataSource,
  User,
  UserRole,
} from './entities';

export interface UserResponse {
  id: string;
  username: string;
  email: string;
  displayName: string;
  role: UserRole;
  householdIds: string[];
  createdAt: string;
  updatedAt: string;
}

export interface HouseholdResponse {
  id: string;
  name: string;
  /** The caller's role in this household */
  role: HouseholdRole;
  createdAt: string;
  updatedAt: string;
}

export interface HouseholdMemberResponse {
  id: string;
  householdId: string;
  householdName: string;
  userId: string;
  /** null when the user record no longer exists */
  username: string | null;
  role: HouseholdRole;
  createdAt: string;
}

export interface LocationResponse {
  id: string;
  householdId: string;
  householdName: string;
  name: string;
  description: string | null;
  createdAt: string;
  updatedAt: string;
}

export type ProductResponse = Product;

/**
 * Normalized result of an external UPC lookup, whether or not it is ever persisted
 */
export interface ProductLookupResult {
  upc: string;
  name: string;
  brand: string | null;
  category: string | null;
  dataSource: Extract<ProductDataSource, 'EXTERNAL_API'>;
  requiresApiRetry: boolean;
  retryAttempts: number;
  lastRetryAttempt: string | null;
}

export interface DetailedProductLookupResult extends ProductLookupResult {
  nutritionGrade: string | null;
  ingredients: string | null;
  allergens: string | null;
  labels: string | null;
}

export interface ProductStatistics {
  total: number;
  manual: number;
  api: number;
  requiresRetry: number;
}

export interface NameAvailability {
  name: string;
  available: boolean;
}

export interface UpcAvailability {
  upc: string;
  valid: boolean;
  available: boolean;
}

export const toUserResponse = (user: User, householdIds: string[]): UserResponse => ({
  id: user.id,
  username: user.username,
  email: user.email,
  displayName: user.displayName,
  role: user.role,
  householdIds,
  createdAt: user.createdAt,
  updatedAt: user.updatedAt,
});

export const toHouseholdResponse = (household: Household, role: HouseholdRole): HouseholdResponse => ({
  id: household.id,
  name: household.name,
  role,
  createdAt: household.createdAt,
  updatedAt: household.updatedAt,
});

export const toHouseholdMemberResponse = (
  member: HouseholdMember,
  household: Household,
  user: User | null
): HouseholdMemberResponse => ({
  id: member.id,
  householdId: member.householdId,
  householdName: household.name,
  userId: member.userId,
  username: user?.username ?? null,
  role: member.role,
  createdAt: member.createdAt,
});

export const toLocationResponse = (location: Location, householdName: string): LocationResponse => ({
  id: location.id,
  householdId: location.householdId,
  householdName,
  name: location.name,
  description: location.description,
  createdAt: location.createdAt,
  updatedAt: location.updatedAt,
});

export const toProductResponse = (product: Product): ProductResponse => ({ ...product });
