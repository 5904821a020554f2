export * from './lib/errors';
export { Logger, LogLevel, logger } from './lib/logger';
export { getTokenClaims } from './lib/auth';
export type { TokenClaims } from './lib/auth';
export { FetchHttpClient, HttpTransportError } from './lib/httpClient';
export type { HttpClient, HttpRequestOptions, HttpResponse } from './lib/httpClient';
export { DEFAULT_UPC_API_CONFIG, readUpcApiConfigFromEnv, validateUpcApiConfig } from './lib/config/upcApi';
export type { UpcApiConfig } from './lib/config/upcApi';
export { createDynamoRepositories, createServiceContainer, getServiceContainer } from './lib/container';
export type { ContainerDeps, ServiceContainer } from './lib/container';
export { AccessGuard } from './services/accessGuard';
export type { AccessDecision } from './services/accessGuard';
export { IdentityResolver } from './services/identityResolver';
export { UpcApiService } from './services/upcApiService';
export { LocationService } from './services/locationService';
export { MAX_RETRY_ATTEMPTS, ProductService } from './services/productService';
export { UserService } from './services/userService';
export { HouseholdService } from './services/householdService';
export { HouseholdMemberService } from './services/householdMemberService';
export * from './repositories/types';
export * from './types/entities';
export * from './types/dto';
