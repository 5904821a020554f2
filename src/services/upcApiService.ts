import { logger } from '../lib/logger';
import {
  ExternalServiceError,
  ParsingError,
  RateLimitExceededError,
  ServiceUnavailableError,
  ValidationError,
} from '../lib/errors';
import { HttpClient, HttpResponse, isSuccessStatus } from '../lib/httpClient';
import { UpcApiConfig, validateUpcApiConfig } from '../lib/config/upcApi';
import type { DetailedProductLookupResult, ProductLookupResult } from '../types/dto';

export const UPC_API_SERVICE_NAME = 'Open Food Facts';
export const PRODUCT_NOT_FOUND_NAME = 'Product not found';
export const UNKNOWN_PRODUCT_NAME = 'Unknown Product';

/** A barcode known to exist upstream, used as a liveness check */
export const HEALTH_CHECK_UPC = '737628064502';

const BASIC_FIELDS = ['product_name', 'brands', 'categories', 'generic_name'];
const DETAILED_FIELDS = [
  ...BASIC_FIELDS,
  'nutrition_grades',
  'nutriscore_data',
  'nutriments',
  'ingredients_text',
  'allergens',
  'labels',
];

export interface UpcApiServiceDeps {
  httpClient: HttpClient;
  config: UpcApiConfig;
  now?: () => Date;
}

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Trimmed value of a textual field; null when missing, blank or not a string
 */
const textField = (node: JsonObject, field: string): string | null => {
  const value = node[field];
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

/**
 * First entry of a comma-separated field ("Ferrero, Nutella" -> "Ferrero")
 */
const firstListEntry = (node: JsonObject, field: string): string | null => {
  const text = textField(node, field);
  const first = text?.split(',')[0]?.trim();
  return first ? first : null;
};

/**
 * UpcApiService
 * Looks up UPC barcodes in Open Food Facts and normalizes the answer
 */
export class UpcApiService {
  private readonly httpClient: HttpClient;
  private readonly config: UpcApiConfig;
  private readonly now: () => Date;

  constructor(deps: UpcApiServiceDeps) {
    this.httpClient = deps.httpClient;
    this.config = validateUpcApiConfig(deps.config);
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Name, brand and category for a UPC. A product unknown upstream yields the
   * not-found placeholder rather than an error.
   */
  async fetchProductData(upc: unknown): Promise<ProductLookupResult> {
    const checkedUpc = this.validateUpc(upc);
    const product = await this.lookup(checkedUpc, BASIC_FIELDS);
    return product ? this.toLookupResult(checkedUpc, product) : this.notFound(checkedUpc);
  }

  async fetchDetailedProductData(upc: unknown): Promise<DetailedProductLookupResult> {
    const checkedUpc = this.validateUpc(upc);
    const product = await this.lookup(checkedUpc, DETAILED_FIELDS);
    if (!product) {
      return {
        ...this.notFound(checkedUpc),
        nutritionGrade: null,
        ingredients: null,
        allergens: null,
        labels: null,
      };
    }
    return {
      ...this.toLookupResult(checkedUpc, product),
      nutritionGrade: textField(product, 'nutrition_grades'),
      ingredients: textField(product, 'ingredients_text'),
      allergens: textField(product, 'allergens'),
      labels: textField(product, 'labels'),
    };
  }

  async isServiceAvailable(): Promise<boolean> {
    const url = `${this.activeBaseUrl()}/api/v2/product/${HEALTH_CHECK_UPC}`;
    try {
      const response = await this.httpClient.get(url, this.requestOptions());
      const available = isSuccessStatus(response.status);
      if (!available) {
        logger.warn('UPC API health check returned non-success status', { status: response.status });
      }
      return available;
    } catch (error) {
      logger.warn('UPC API health check failed', { url }, error instanceof Error ? error : undefined);
      return false;
    }
  }

  // Sent upstream as given, only percent-encoded
  private validateUpc(upc: unknown): string {
    if (typeof upc !== 'string' || upc.trim().length === 0) {
      throw new ValidationError('UPC cannot be null or empty', 'upc');
    }
    return upc;
  }

  /**
   * The product node of the upstream answer, or null when upstream does not know the UPC
   */
  private async lookup(upc: string, fields: string[]): Promise<JsonObject | null> {
    const url =
      `${this.activeBaseUrl()}/api/v2/product/${encodeURIComponent(upc)}` +
      `?fields=${fields.join(',')}`;

    logger.debug('Fetching product data from UPC API', { upc, staging: this.config.useStaging });

    let response: HttpResponse;
    try {
      response = await this.httpClient.get(url, this.requestOptions());
    } catch (error) {
      throw new ServiceUnavailableError(UPC_API_SERVICE_NAME, `Request for UPC ${upc} failed`, {
        cause: error,
      });
    }

    const root = this.parseBody(upc, response);
    if (!isJsonObject(root) || root['status'] !== 1) {
      logger.info('Product not found in UPC API', { upc });
      return null;
    }
    const product = root['product'];
    if (!isJsonObject(product)) {
      logger.info('UPC API response has no product data', { upc });
      return null;
    }
    return product;
  }

  private parseBody(upc: string, response: HttpResponse): unknown {
    const { status, body } = response;
    if (status === 429) {
      throw new RateLimitExceededError(UPC_API_SERVICE_NAME, `Rate limit exceeded looking up UPC ${upc}`);
    }
    if (status >= 500) {
      throw new ServiceUnavailableError(UPC_API_SERVICE_NAME, `Server error ${status} for UPC ${upc}`);
    }
    if (!isSuccessStatus(status)) {
      throw new ExternalServiceError(UPC_API_SERVICE_NAME, `Request for UPC ${upc} failed with status ${status}`);
    }
    if (body.trim().length === 0) {
      throw new ExternalServiceError(UPC_API_SERVICE_NAME, 'Empty response received');
    }

    try {
      return JSON.parse(body);
    } catch (error) {
      throw new ParsingError(`Failed to parse UPC API response for UPC ${upc}`, { cause: error });
    }
  }

  private toLookupResult(upc: string, product: JsonObject): ProductLookupResult {
    return {
      upc,
      name: textField(product, 'product_name') ?? textField(product, 'generic_name') ?? UNKNOWN_PRODUCT_NAME,
      brand: firstListEntry(product, 'brands'),
      category: firstListEntry(product, 'categories'),
      dataSource: 'EXTERNAL_API',
      requiresApiRetry: false,
      retryAttempts: 0,
      lastRetryAttempt: null,
    };
  }

  private notFound(upc: string): ProductLookupResult {
    return {
      upc,
      name: PRODUCT_NOT_FOUND_NAME,
      brand: null,
      category: null,
      dataSource: 'EXTERNAL_API',
      requiresApiRetry: true,
      retryAttempts: 1,
      lastRetryAttempt: this.now().toISOString(),
    };
  }

  private activeBaseUrl(): string {
    return this.config.useStaging ? this.config.stagingUrl : this.config.baseUrl;
  }

  private requestOptions(): { headers: Record<string, string>; timeoutMs: number } {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      Accept: 'application/json',
      'Cache-Control': 'no-cache',
    };
    if (this.config.useStaging) {
      const credentials = `${this.config.stagingUsername}:${this.config.stagingPassword}`;
      headers['Authorization'] = `Basic ${Buffer.from(credentials).toString('base64')}`;
    }
    return { headers, timeoutMs: this.config.timeoutMs };
  }
}
