/**
 * Zod validation schemas - Household Inventory
 *
 * Request schemas validate caller input; record schemas validate items read
 * back from DynamoDB and drop the single-table key attributes.
 */

import { z } from 'zod';

const requiredText = (label: string) =>
  z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} must be a string` })
    .trim()
    .min(1, `${label} cannot be blank`);

const optionalText = (label: string, max: number) =>
  z
    .string({ invalid_type_error: `${label} must be a string` })
    .trim()
    .max(max, `${label} must be ${max} characters or less`)
    .nullable()
    .optional();

// =============================================================================
// Request Schemas
// =============================================================================

export const LocationNameSchema = requiredText('Location name').pipe(
  z.string().max(255, 'Location name must be 255 characters or less')
);

export const CreateLocationSchema = z.object(
  {
    householdId: requiredText('Household ID'),
    name: LocationNameSchema,
    description: optionalText('Description', 500),
  },
  { required_error: 'Location request is required', invalid_type_error: 'Location request must be an object' }
);

export const UpdateLocationSchema = z.object(
  {
    name: LocationNameSchema.nullable().optional(),
    description: optionalText('Description', 500),
  },
  { required_error: 'Update request is required', invalid_type_error: 'Update request must be an object' }
);

const ExpirationDaysSchema = z
  .number({ invalid_type_error: 'Default expiration days must be a number' })
  .int('Default expiration days must be a whole number')
  .nonnegative('Default expiration days cannot be negative')
  .nullable()
  .optional();

export const CreateProductSchema = z.object(
  {
    upc: requiredText('UPC'),
    name: requiredText('Product name'),
    brand: optionalText('Brand', 255),
    category: optionalText('Category', 255),
    defaultExpirationDays: ExpirationDaysSchema,
  },
  { required_error: 'Product request is required', invalid_type_error: 'Product request must be an object' }
);

export const UpdateProductSchema = z.object(
  {
    name: requiredText('Product name').nullable().optional(),
    brand: optionalText('Brand', 255),
    category: optionalText('Category', 255),
    defaultExpirationDays: ExpirationDaysSchema,
  },
  { required_error: 'Update request is required', invalid_type_error: 'Update request must be an object' }
);

export const UpdateUserSchema = z.object(
  {
    displayName: z
      .string({ invalid_type_error: 'Display name must be a string' })
      .trim()
      .min(2, 'Display name must be between 2 and 50 characters')
      .max(50, 'Display name must be between 2 and 50 characters')
      .nullable()
      .optional(),
    email: z
      .string({ invalid_type_error: 'Email must be a string' })
      .trim()
      .email('Email must be valid')
      .nullable()
      .optional(),
    username: z.string({ invalid_type_error: 'Username must be a string' }).nullable().optional(),
  },
  { required_error: 'Update request is required', invalid_type_error: 'Update request must be an object' }
);

export const HouseholdRequestSchema = z.object(
  {
    name: requiredText('Household name').pipe(
      z.string().max(100, 'Household name must be 100 characters or less')
    ),
  },
  { required_error: 'Household request is required', invalid_type_error: 'Household request must be an object' }
);

export const HouseholdRoleSchema = z.enum(['OWNER', 'ADMIN', 'MEMBER', 'VIEWER'], {
  required_error: 'Role is required',
  invalid_type_error: 'Role must be one of OWNER, ADMIN, MEMBER, VIEWER',
});

export const AddMemberSchema = z.object(
  {
    userId: requiredText('User ID'),
    role: HouseholdRoleSchema,
  },
  { required_error: 'Member request is required', invalid_type_error: 'Member request must be an object' }
);

export const MemberRoleUpdateSchema = z.object(
  { role: HouseholdRoleSchema },
  { required_error: 'Role update is required', invalid_type_error: 'Role update must be an object' }
);

export const TransferOwnershipSchema = z.object(
  { newOwnerId: requiredText('New owner ID') },
  { required_error: 'Transfer request is required', invalid_type_error: 'Transfer request must be an object' }
);

/**
 * Sparse update: any keys, filtered against a whitelist by each service
 */
export const PatchSchema = z.record(z.string(), z.unknown(), {
  required_error: 'Patch data cannot be null',
  invalid_type_error: 'Patch data must be an object',
});

export const ProductSortFieldSchema = z.enum(['name', 'upc', 'brand', 'category', 'createdAt', 'updatedAt']);

export const PageRequestSchema = z.object({
  page: z.coerce.number().int().nonnegative('Page cannot be negative').default(0),
  size: z.coerce
    .number()
    .int()
    .min(1, 'Page size must be at least 1')
    .max(100, 'Page size must be 100 or less')
    .default(20),
  sort: ProductSortFieldSchema.default('name'),
  direction: z.enum(['asc', 'desc']).default('asc'),
});

export const ProductDataSourceSchema = z.enum(['MANUAL', 'EXTERNAL_API']);

export type CreateLocationRequest = z.input<typeof CreateLocationSchema>;
export type UpdateLocationRequest = z.input<typeof UpdateLocationSchema>;
export type CreateProductRequest = z.input<typeof CreateProductSchema>;
export type UpdateProductRequest = z.input<typeof UpdateProductSchema>;
export type UpdateUserRequest = z.input<typeof UpdateUserSchema>;
export type HouseholdRequest = z.input<typeof HouseholdRequestSchema>;
export type AddMemberRequest = z.input<typeof AddMemberSchema>;
export type MemberRoleUpdateRequest = z.input<typeof MemberRoleUpdateSchema>;
export type TransferOwnershipRequest = z.input<typeof TransferOwnershipSchema>;
export type PatchRequest = z.infer<typeof PatchSchema>;
export type PageRequestInput = z.input<typeof PageRequestSchema>;

// =============================================================================
// Stored Record Schemas
// =============================================================================

const timestamps = {
  createdAt: z.string(),
  updatedAt: z.string(),
};

export const UserRecordSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  displayName: z.string(),
  role: z.enum(['USER', 'ADMIN']),
  ...timestamps,
});

export const HouseholdRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  ...timestamps,
});

export const HouseholdMemberRecordSchema = z.object({
  id: z.string(),
  householdId: z.string(),
  userId: z.string(),
  role: HouseholdRoleSchema,
  ...timestamps,
});

export const LocationRecordSchema = z.object({
  id: z.string(),
  householdId: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  ...timestamps,
});

export const ProductRecordSchema = z.object({
  id: z.string(),
  upc: z.string(),
  name: z.string(),
  brand: z.string().nullable(),
  category: z.string().nullable(),
  defaultExpirationDays: z.number().nullable(),
  dataSource: ProductDataSourceSchema,
  requiresApiRetry: z.boolean(),
  retryAttempts: z.number(),
  lastRetryAttempt: z.string().nullable(),
  ...timestamps,
});

// =============================================================================
// Bulk Request Schemas
// =============================================================================

/**
 * Entries are validated one by one during import so a bad entry only skips itself
 */
export const BulkImportSchema = z
  .array(z.unknown(), { invalid_type_error: 'Request body must be an array of products' })
  .min(1, 'Product requests list cannot be empty');

export const BulkDeleteSchema = z.object({
  productIds: z
    .array(z.string().trim().min(1, 'Product ID cannot be blank'), {
      required_error: 'Product IDs are required',
      invalid_type_error: 'Product IDs must be an array',
    })
    .min(1, 'Product IDs list cannot be empty'),
});
