import { logger } from '../lib/logger';
import {
  BusinessRuleViolationError,
  ConflictError,
  ExternalServiceError,
  NotFoundError,
  ValidationError,
  toError,
} from '../lib/errors';
import { withDataIntegrity } from '../lib/persistence';
import { parseRequest, requireText } from '../lib/validation';
import type { TokenClaims } from '../lib/auth';
import type { Page, ProductRepository } from '../repositories/types';
import type { Product, ProductDataSource, ProductInput, User } from '../types/entities';
import {
  ProductLookupResult,
  ProductResponse,
  ProductStatistics,
  toProductResponse,
} from '../types/dto';
import {
  CreateProductRequest,
  CreateProductSchema,
  PageRequestInput,
  PageRequestSchema,
  PatchSchema,
  ProductDataSourceSchema,
  UpdateProductRequest,
  UpdateProductSchema,
} from '../types/schemas';
import type { AccessGuard } from './accessGuard';
import type { IdentityResolver } from './identityResolver';
import { UNKNOWN_PRODUCT_NAME } from './upcApiService';
import type { UpcApiService } from './upcApiService';

/** A product that has failed enrichment this many times is no longer retried */
export const MAX_RETRY_ATTEMPTS = 5;

const UPC_FORMAT = /^\d{12,13}$/;

export interface ProductServiceDeps {
  products: ProductRepository;
  identityResolver: IdentityResolver;
  accessGuard: AccessGuard;
  upcApiService: Pick<UpcApiService, 'fetchProductData'>;
  now?: () => Date;
}

type EnrichmentOutcome =
  | { kind: 'found'; lookup: ProductLookupResult }
  | { kind: 'not_found'; lookup: ProductLookupResult }
  | { kind: 'failed'; error: Error };

/**
 * ProductService
 * The global product catalog. Reads and creation are open to any authenticated
 * user; every other write needs the global ADMIN role.
 */
export class ProductService {
  private readonly products: ProductRepository;
  private readonly identityResolver: IdentityResolver;
  private readonly accessGuard: AccessGuard;
  private readonly upcApiService: Pick<UpcApiService, 'fetchProductData'>;
  private readonly now: () => Date;

  constructor(deps: ProductServiceDeps) {
    this.products = deps.products;
    this.identityResolver = deps.identityResolver;
    this.accessGuard = deps.accessGuard;
    this.upcApiService = deps.upcApiService;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Create a catalog entry, enriching it from the UPC lookup when possible.
   * Lookup failures never fail the creation; the product is flagged for retry instead.
   */
  async createProduct(claims: TokenClaims, request: CreateProductRequest): Promise<ProductResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    return this.createFor(user, request);
  }

  async getProductById(claims: TokenClaims, productId: string): Promise<ProductResponse> {
    await this.identityResolver.resolveCurrentUser(claims);
    return toProductResponse(await this.requireProduct(productId));
  }

  async getProductByUpc(claims: TokenClaims, upc: string): Promise<ProductResponse> {
    await this.identityResolver.resolveCurrentUser(claims);
    const code = requireText(upc, 'upc', 'UPC');
    const product = await this.products.findByUpc(code);
    if (!product) {
      throw new NotFoundError('Product', code);
    }
    return toProductResponse(product);
  }

  /**
   * Full update; null or omitted fields keep their current value
   */
  async updateProduct(
    claims: TokenClaims,
    productId: string,
    request: UpdateProductRequest
  ): Promise<ProductResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const updates = parseRequest(UpdateProductSchema, request);
    this.accessGuard.requireAdmin(user, 'update products');
    const product = await this.requireProduct(productId);

    const next: Product = { ...product };
    if (updates.name != null) next.name = updates.name;
    if (updates.brand != null) next.brand = updates.brand;
    if (updates.category != null) next.category = updates.category;
    if (updates.defaultExpirationDays != null) next.defaultExpirationDays = updates.defaultExpirationDays;

    const saved = await this.save(next);
    logger.info('Product updated', { productId: saved.id, userId: user.id });
    return toProductResponse(saved);
  }

  /**
   * Sparse update over name, brand, category and defaultExpirationDays.
   * Values of the wrong type and unknown keys are ignored.
   */
  async patchProduct(
    claims: TokenClaims,
    productId: string,
    patch: Record<string, unknown>
  ): Promise<ProductResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const fields = parseRequest(PatchSchema, patch);
    if (Object.keys(fields).length === 0) {
      throw new ValidationError('Patch data cannot be empty');
    }
    this.accessGuard.requireAdmin(user, 'patch products');
    const product = await this.requireProduct(productId);

    const next: Product = { ...product };
    const name = fields['name'];
    if (typeof name === 'string') {
      if (name.trim().length === 0) {
        throw new ValidationError('Product name cannot be blank', 'name');
      }
      next.name = name.trim();
    }
    const brand = fields['brand'];
    if (typeof brand === 'string') {
      next.brand = brand.trim() || null;
    }
    const category = fields['category'];
    if (typeof category === 'string') {
      next.category = category.trim() || null;
    }
    const expirationDays = fields['defaultExpirationDays'];
    if (typeof expirationDays === 'number' && Number.isInteger(expirationDays)) {
      if (expirationDays < 0) {
        throw new ValidationError('Default expiration days cannot be negative', 'defaultExpirationDays');
      }
      next.defaultExpirationDays = expirationDays;
    }

    const saved = await this.save(next);
    logger.info('Product patched', { productId: saved.id, fields: Object.keys(fields), userId: user.id });
    return toProductResponse(saved);
  }

  async deleteProduct(claims: TokenClaims, productId: string): Promise<void> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    this.accessGuard.requireAdmin(user, 'delete products');
    const product = await this.requireProduct(productId);

    await withDataIntegrity('delete product', () => this.products.delete(product), {
      productId: product.id,
    });
    logger.info('Product deleted', { productId: product.id, userId: user.id });
  }

  async searchProductsByName(claims: TokenClaims, searchTerm: string): Promise<ProductResponse[]> {
    await this.identityResolver.resolveCurrentUser(claims);
    const term = requireText(searchTerm, 'searchTerm', 'Search term');
    return (await this.products.findByNameContainingIgnoreCase(term)).map(toProductResponse);
  }

  async getProductsByCategory(claims: TokenClaims, category: string): Promise<ProductResponse[]> {
    await this.identityResolver.resolveCurrentUser(claims);
    const value = requireText(category, 'category', 'Category');
    return (await this.products.findByCategory(value)).map(toProductResponse);
  }

  async getProductsByBrand(claims: TokenClaims, brand: string): Promise<ProductResponse[]> {
    await this.identityResolver.resolveCurrentUser(claims);
    const value = requireText(brand, 'brand', 'Brand');
    return (await this.products.findByBrand(value)).map(toProductResponse);
  }

  async getProductsByDataSource(
    claims: TokenClaims,
    dataSource: ProductDataSource
  ): Promise<ProductResponse[]> {
    await this.identityResolver.resolveCurrentUser(claims);
    const source = parseRequest(ProductDataSourceSchema, dataSource);
    return (await this.products.findByDataSource(source)).map(toProductResponse);
  }

  async getAllProducts(claims: TokenClaims, pageRequest: PageRequestInput = {}): Promise<Page<ProductResponse>> {
    await this.identityResolver.resolveCurrentUser(claims);
    const request = parseRequest(PageRequestSchema, pageRequest);
    const page = await this.products.findAll(request);
    return { ...page, content: page.content.map(toProductResponse) };
  }

  async getProductsRequiringRetry(claims: TokenClaims): Promise<ProductResponse[]> {
    await this.identityResolver.resolveCurrentUser(claims);
    return (await this.products.findByRequiresApiRetryTrue()).map(toProductResponse);
  }

  async getProductsEligibleForRetry(
    claims: TokenClaims,
    maxRetryAttempts: number = MAX_RETRY_ATTEMPTS
  ): Promise<ProductResponse[]> {
    await this.identityResolver.resolveCurrentUser(claims);
    const limit = this.validateAttemptLimit(maxRetryAttempts);
    return (await this.products.findByRequiresApiRetryTrueAndRetryAttemptsLessThan(limit)).map(
      toProductResponse
    );
  }

  /**
   * Re-run the UPC lookup for one product.
   *
   * A placeholder answer counts as a failed attempt and is returned, not thrown.
   * A lookup error is recorded on the product and then rethrown as ExternalServiceError.
   */
  async retryApiEnrichment(claims: TokenClaims, productId: string): Promise<ProductResponse> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    this.accessGuard.requireAdmin(user, 'retry API enrichment');
    const product = await this.requireProduct(productId);

    if (product.retryAttempts >= MAX_RETRY_ATTEMPTS) {
      throw new BusinessRuleViolationError(
        `Maximum retry attempts (${MAX_RETRY_ATTEMPTS}) exceeded for product ${product.id}`
      );
    }

    const outcome = await this.lookup(product.upc);
    const saved = await this.save(this.applyRetryOutcome(product, outcome));

    if (outcome.kind === 'failed') {
      logger.warn(
        'Retry enrichment failed',
        { productId: saved.id, retryAttempts: saved.retryAttempts },
        outcome.error
      );
      throw new ExternalServiceError(
        'Product enrichment',
        `Failed to enrich product with API data: ${outcome.error.message}`,
        { cause: outcome.error }
      );
    }

    logger.info('Retry enrichment completed', {
      productId: saved.id,
      found: outcome.kind === 'found',
      retryAttempts: saved.retryAttempts,
    });
    return toProductResponse(saved);
  }

  /**
   * Retry every product flagged for enrichment with fewer than `maxRetryAttempts` attempts.
   * Returns how many were enriched.
   */
  async processBatchRetry(
    claims: TokenClaims,
    maxRetryAttempts: number = MAX_RETRY_ATTEMPTS
  ): Promise<number> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    const limit = this.validateAttemptLimit(maxRetryAttempts);
    this.accessGuard.requireAdmin(user, 'process batch retry');

    const candidates = await this.products.findByRequiresApiRetryTrueAndRetryAttemptsLessThan(limit);
    let enriched = 0;

    for (const product of candidates) {
      const outcome = await this.lookup(product.upc);
      try {
        await this.save(this.applyRetryOutcome(product, outcome));
      } catch (error) {
        logger.error('Failed to record batch retry outcome', toError(error), { productId: product.id });
        continue;
      }
      if (outcome.kind === 'found') {
        enriched++;
      } else if (outcome.kind === 'failed') {
        logger.warn('Batch retry lookup failed', { productId: product.id }, outcome.error);
      }
    }

    logger.info('Batch retry completed', { enriched, processed: candidates.length, userId: user.id });
    return enriched;
  }

  async getProductStatistics(claims: TokenClaims): Promise<ProductStatistics> {
    await this.identityResolver.resolveCurrentUser(claims);
    const [total, manual, api, requiresRetry] = await Promise.all([
      this.products.count(),
      this.products.findByDataSource('MANUAL'),
      this.products.findByDataSource('EXTERNAL_API'),
      this.products.findByRequiresApiRetryTrue(),
    ]);
    return {
      total,
      manual: manual.length,
      api: api.length,
      requiresRetry: requiresRetry.length,
    };
  }

  async isUpcAvailable(claims: TokenClaims, upc: string): Promise<boolean> {
    await this.identityResolver.resolveCurrentUser(claims);
    const code = requireText(upc, 'upc', 'UPC');
    return (await this.products.findByUpc(code)) === null;
  }

  /**
   * 12-digit UPC-A or 13-digit EAN-13, surrounding whitespace ignored
   */
  isValidUpc(upc: unknown): boolean {
    return typeof upc === 'string' && UPC_FORMAT.test(upc.trim());
  }

  /**
   * Create each product in turn. Duplicates and invalid entries are skipped.
   */
  async bulkImportProducts(claims: TokenClaims, requests: readonly unknown[]): Promise<ProductResponse[]> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    if (!Array.isArray(requests) || requests.length === 0) {
      throw new ValidationError('Product requests list cannot be empty', 'products');
    }
    this.accessGuard.requireAdmin(user, 'bulk import products');

    const imported: ProductResponse[] = [];
    for (const request of requests) {
      try {
        imported.push(await this.createFor(user, request));
      } catch (error) {
        if (error instanceof ConflictError) {
          logger.warn('Skipping duplicate product in bulk import', { message: error.message });
        } else {
          logger.error('Skipping product that failed to import', toError(error));
        }
      }
    }

    logger.info('Bulk import completed', { imported: imported.length, requested: requests.length });
    return imported;
  }

  /**
   * Delete each listed product. Unknown ids are skipped. Returns how many were deleted.
   */
  async bulkDeleteProducts(claims: TokenClaims, productIds: readonly string[]): Promise<number> {
    const user = await this.identityResolver.resolveCurrentUser(claims);
    if (!Array.isArray(productIds) || productIds.length === 0) {
      throw new ValidationError('Product IDs list cannot be empty', 'productIds');
    }
    this.accessGuard.requireAdmin(user, 'bulk delete products');

    let deleted = 0;
    for (const productId of productIds) {
      try {
        const product = await this.products.findById(productId);
        if (product) {
          await this.products.delete(product);
          deleted++;
        }
      } catch (error) {
        logger.error('Failed to delete product in bulk delete', toError(error), { productId });
      }
    }

    logger.info('Bulk delete completed', { deleted, requested: productIds.length });
    return deleted;
  }

  private async createFor(user: User, request: unknown): Promise<ProductResponse> {
    const fields = parseRequest(CreateProductSchema, request);

    if (await this.products.findByUpc(fields.upc)) {
      throw new ConflictError(`Product with UPC "${fields.upc}" already exists`);
    }

    const input: ProductInput = {
      upc: fields.upc,
      name: fields.name,
      brand: fields.brand || null,
      category: fields.category || null,
      defaultExpirationDays: fields.defaultExpirationDays ?? null,
      dataSource: 'MANUAL',
      requiresApiRetry: true,
      retryAttempts: 0,
      lastRetryAttempt: null,
    };

    const outcome = await this.lookup(fields.upc);
    switch (outcome.kind) {
      case 'found':
        Object.assign(input, this.enrichedFields(input, outcome.lookup));
        break;
      case 'not_found':
        input.retryAttempts = outcome.lookup.retryAttempts;
        input.lastRetryAttempt = outcome.lookup.lastRetryAttempt;
        break;
      case 'failed':
        logger.warn('UPC lookup failed, creating manual entry', { upc: fields.upc }, outcome.error);
        break;
    }

    const product = await withDataIntegrity('save product', () => this.products.create(input), {
      upc: fields.upc,
    });
    logger.info('Product created', {
      productId: product.id,
      upc: product.upc,
      dataSource: product.dataSource,
      userId: user.id,
    });
    return toProductResponse(product);
  }

  private async lookup(upc: string): Promise<EnrichmentOutcome> {
    try {
      const lookup = await this.upcApiService.fetchProductData(upc);
      return lookup.requiresApiRetry ? { kind: 'not_found', lookup } : { kind: 'found', lookup };
    } catch (error) {
      return { kind: 'failed', error: toError(error) };
    }
  }

  /**
   * Descriptive fields from a successful lookup. Empty lookup values, and the
   * unnamed-product fallback, keep the current ones.
   */
  private enrichedFields<T extends Pick<Product, 'name' | 'brand' | 'category'>>(
    current: T,
    lookup: ProductLookupResult
  ): Pick<Product, 'name' | 'brand' | 'category' | 'dataSource' | 'requiresApiRetry' | 'retryAttempts'> {
    return {
      name: lookup.name && lookup.name !== UNKNOWN_PRODUCT_NAME ? lookup.name : current.name,
      brand: lookup.brand || current.brand,
      category: lookup.category || current.category,
      dataSource: 'EXTERNAL_API',
      requiresApiRetry: false,
      retryAttempts: 0,
    };
  }

  private applyRetryOutcome(product: Product, outcome: EnrichmentOutcome): Product {
    const attemptedAt = this.now().toISOString();
    if (outcome.kind === 'found') {
      return { ...product, ...this.enrichedFields(product, outcome.lookup), lastRetryAttempt: attemptedAt };
    }
    return {
      ...product,
      requiresApiRetry: true,
      retryAttempts: product.retryAttempts + 1,
      lastRetryAttempt: attemptedAt,
    };
  }

  private validateAttemptLimit(maxRetryAttempts: number): number {
    if (!Number.isInteger(maxRetryAttempts) || maxRetryAttempts < 0) {
      throw new ValidationError('Max retry attempts must be a non-negative integer', 'maxRetryAttempts');
    }
    return maxRetryAttempts;
  }

  private async requireProduct(productId: string): Promise<Product> {
    const id = requireText(productId, 'productId', 'Product ID');
    const product = await this.products.findById(id);
    if (!product) {
      throw new NotFoundError('Product', id);
    }
    return product;
  }

  private save(product: Product): Promise<Product> {
    return withDataIntegrity('save product', () => this.products.save(product), {
      productId: product.id,
    });
  }
}
