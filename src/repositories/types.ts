/**
 * Repository contracts consumed by the service layer.
 *
 * `create` assigns ids and timestamps and returns the stored record; `save`
 * overwrites an existing record and returns it with `updatedAt` refreshed.
 */

import type {
  Household,
  HouseholdInput,
  HouseholdMember,
  HouseholdMemberInput,
  Location,
  LocationInput,
  Product,
  ProductDataSource,
  ProductInput,
  User,
  UserInput,
} from '../types/entities';

export type SortDirection = 'asc' | 'desc';

export type ProductSortField = 'name' | 'upc' | 'brand' | 'category' | 'createdAt' | 'updatedAt';

export interface PageRequest {
  page: number; // zero-based
  size: number;
  sort: ProductSortField;
  direction: SortDirection;
}

export interface Page<T> {
  content: T[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  create(input: UserInput): Promise<User>;
  save(user: User): Promise<User>;
  delete(user: User): Promise<void>;
}

export interface HouseholdRepository {
  findById(id: string): Promise<Household | null>;
  existsById(id: string): Promise<boolean>;
  create(input: HouseholdInput): Promise<Household>;
  save(household: Household): Promise<Household>;
  delete(household: Household): Promise<void>;
}

export interface HouseholdMemberRepository {
  findByHouseholdIdAndUserId(householdId: string, userId: string): Promise<HouseholdMember | null>;
  findByUserId(userId: string): Promise<HouseholdMember[]>;
  findByHouseholdId(householdId: string): Promise<HouseholdMember[]>;
  create(input: HouseholdMemberInput): Promise<HouseholdMember>;
  save(member: HouseholdMember): Promise<HouseholdMember>;
  delete(member: HouseholdMember): Promise<void>;
}

export interface LocationRepository {
  findById(id: string): Promise<Location | null>;
  /** Sorted by name */
  findByHouseholdId(householdId: string): Promise<Location[]>;
  existsByHouseholdIdAndName(householdId: string, name: string): Promise<boolean>;
  /** Case-insensitive substring match on name or description */
  searchByNameOrDescription(householdId: string, term: string): Promise<Location[]>;
  create(input: LocationInput): Promise<Location>;
  save(location: Location): Promise<Location>;
  delete(location: Location): Promise<void>;
}

export interface ProductRepository {
  findById(id: string): Promise<Product | null>;
  findByUpc(upc: string): Promise<Product | null>;
  findByNameContainingIgnoreCase(term: string): Promise<Product[]>;
  findByCategory(category: string): Promise<Product[]>;
  findByBrand(brand: string): Promise<Product[]>;
  findByDataSource(dataSource: ProductDataSource): Promise<Product[]>;
  findByRequiresApiRetryTrue(): Promise<Product[]>;
  findByRequiresApiRetryTrueAndRetryAttemptsLessThan(maxAttempts: number): Promise<Product[]>;
  findAll(pageRequest: PageRequest): Promise<Page<Product>>;
  count(): Promise<number>;
  create(input: ProductInput): Promise<Product>;
  save(product: Product): Promise<Product>;
  delete(product: Product): Promise<void>;
}

export interface Repositories {
  users: UserRepository;
  households: HouseholdRepository;
  members: HouseholdMemberRepository;
  locations: LocationRepository;
  products: ProductRepository;
}
