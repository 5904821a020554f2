/**
 * Service wiring
 *
 * Handlers ask for the container; tests build one from fakes with
 * createServiceContainer.
 */

import { HouseholdModel } from '../models/household';
import { HouseholdMemberModel } from '../models/member';
import { LocationModel } from '../models/location';
import { ProductModel } from '../models/product';
import { UserModel } from '../models/user';
import type { Repositories } from '../repositories/types';
import { AccessGuard } from '../services/accessGuard';
import { HouseholdMemberService } from '../services/householdMemberService';
import { HouseholdService } from '../services/householdService';
import { IdentityResolver } from '../services/identityResolver';
import { LocationService } from '../services/locationService';
import { ProductService } from '../services/productService';
import { UpcApiService } from '../services/upcApiService';
import { UserService } from '../services/userService';
import { UpcApiConfig, readUpcApiConfigFromEnv } from './config/upcApi';
import { FetchHttpClient, HttpClient } from './httpClient';

export interface ServiceContainer {
  identityResolver: IdentityResolver;
  accessGuard: AccessGuard;
  upcApiService: UpcApiService;
  locationService: LocationService;
  productService: ProductService;
  userService: UserService;
  householdService: HouseholdService;
  householdMemberService: HouseholdMemberService;
}

export interface ContainerDeps {
  repositories: Repositories;
  httpClient: HttpClient;
  upcApiConfig: UpcApiConfig;
  now?: () => Date;
}

export function createServiceContainer(deps: ContainerDeps): ServiceContainer {
  const { repositories, now } = deps;
  const identityResolver = new IdentityResolver(repositories.users);
  const accessGuard = new AccessGuard(repositories.members);
  const upcApiService = new UpcApiService({
    httpClient: deps.httpClient,
    config: deps.upcApiConfig,
    ...(now ? { now } : {}),
  });

  return {
    identityResolver,
    accessGuard,
    upcApiService,
    locationService: new LocationService({
      households: repositories.households,
      locations: repositories.locations,
      identityResolver,
      accessGuard,
    }),
    productService: new ProductService({
      products: repositories.products,
      identityResolver,
      accessGuard,
      upcApiService,
      ...(now ? { now } : {}),
    }),
    userService: new UserService({
      users: repositories.users,
      members: repositories.members,
      identityResolver,
    }),
    householdService: new HouseholdService({
      households: repositories.households,
      members: repositories.members,
      locations: repositories.locations,
      identityResolver,
      accessGuard,
    }),
    householdMemberService: new HouseholdMemberService({
      households: repositories.households,
      members: repositories.members,
      users: repositories.users,
      identityResolver,
      accessGuard,
    }),
  };
}

export function createDynamoRepositories(): Repositories {
  return {
    users: new UserModel(),
    households: new HouseholdModel(),
    members: new HouseholdMemberModel(),
    locations: new LocationModel(),
    products: new ProductModel(),
  };
}

let container: ServiceContainer | undefined;

/**
 * Production container, built on first use and reused across warm invocations
 */
export function getServiceContainer(): ServiceContainer {
  if (!container) {
    container = createServiceContainer({
      repositories: createDynamoRepositories(),
      httpClient: new FetchHttpClient(),
      upcApiConfig: readUpcApiConfigFromEnv(),
    });
  }
  return container;
}

export function resetServiceContainer(): void {
  container = undefined;
}
