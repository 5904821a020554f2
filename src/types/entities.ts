/**
 * Entity Type Definitions - Household Inventory
 *
 * Domain records as the services see them. Persistence keys are added by the
 * DynamoDB models (see KeyBuilder) and stripped again on read.
 */

/**
 * Global role of a user across the whole application
 */
export type UserRole = 'USER' | 'ADMIN';

/**
 * Role of a user inside one household
 */
export type HouseholdRole = 'OWNER' | 'ADMIN' | 'MEMBER' | 'VIEWER';

/**
 * Where a product's descriptive fields came from
 */
export type ProductDataSource = 'MANUAL' | 'EXTERNAL_API';

export interface Timestamps {
  createdAt: string; // ISO 8601
  updatedAt: string; // ISO 8601
}

/**
 * User - created lazily from token claims on first authenticated request
 */
export interface User extends Timestamps {
  id: string; // token subject
  username: string; // email local-part, never changed after creation
  email: string;
  displayName: string;
  role: UserRole;
}

/**
 * Household - group of users sharing an inventory
 */
export interface Household extends Timestamps {
  id: string;
  name: string;
}

/**
 * HouseholdMember - the only source of truth for household access
 */
export interface HouseholdMember extends Timestamps {
  id: string;
  householdId: string;
  userId: string;
  role: HouseholdRole;
}

/**
 * Location - a named place inside a household (pantry, freezer, ...)
 */
export interface Location extends Timestamps {
  id: string;
  householdId: string;
  name: string;
  description: string | null;
}

/**
 * Product - global catalog entry keyed by UPC
 */
export interface Product extends Timestamps {
  id: string;
  upc: string;
  name: string;
  brand: string | null;
  category: string | null;
  defaultExpirationDays: number | null;
  dataSource: ProductDataSource;
  requiresApiRetry: boolean;
  retryAttempts: number;
  lastRetryAttempt: string | null;
}

export const GSI1 = 'GSI1';
export const GSI2 = 'GSI2';

/**
 * DynamoDB key construction helpers
 */
export const KeyBuilder = {
  user: (userId: string, username: string, email: string) => ({
    PK: `USER#${userId}`,
    SK: 'PROFILE',
    GSI1PK: `USERNAME#${username}`,
    GSI1SK: `USER#${userId}`,
    GSI2PK: `EMAIL#${email}`,
    GSI2SK: `USER#${userId}`,
  }),

  household: (householdId: string) => ({
    PK: `HOUSEHOLD#${householdId}`,
    SK: `HOUSEHOLD#${householdId}`,
  }),

  member: (householdId: string, userId: string) => ({
    PK: `HOUSEHOLD#${householdId}`,
    SK: `MEMBER#${userId}`,
    GSI1PK: `USER#${userId}`,
    GSI1SK: `HOUSEHOLD#${householdId}`,
  }),

  location: (householdId: string, locationId: string) => ({
    PK: `HOUSEHOLD#${householdId}`,
    SK: `LOCATION#${locationId}`,
    GSI1PK: `LOCATION#${locationId}`,
    GSI1SK: `HOUSEHOLD#${householdId}`,
  }),

  product: (productId: string, upc: string) => ({
    PK: `PRODUCT#${productId}`,
    SK: `PRODUCT#${productId}`,
    GSI1PK: `UPC#${upc}`,
    GSI1SK: `PRODUCT#${productId}`,
    GSI2PK: 'CATALOG',
    GSI2SK: `PRODUCT#${productId}`,
  }),
};

/**
 * Input types for creating entities (without generated fields)
 */
export interface UserInput {
  id: string;
  username: string;
  email: string;
  displayName: string;
  role?: UserRole;
}

export interface HouseholdInput {
  name: string;
}

export interface HouseholdMemberInput {
  householdId: string;
  userId: string;
  role: HouseholdRole;
}

export interface LocationInput {
  householdId: string;
  name: string;
  description: string | null;
}

export type ProductInput = Omit<Product, 'id' | 'createdAt' | 'updatedAt'>;
