/**
 * Integration Tests for product handlers
 * The UPC lookup answers from a scripted HTTP client.
 */

import { handler as createProduct } from '../../../src/handlers/products/createProduct';
import { handler as getProduct } from '../../../src/handlers/products/getProduct';
import { handler as getProductByUpc } from '../../../src/handlers/products/getProductByUpc';
import { handler as listProducts } from '../../../src/handlers/products/listProducts';
import { handler as patchProduct } from '../../../src/handlers/products/patchProduct';
import { handler as deleteProduct } from '../../../src/handlers/products/deleteProduct';
import { handler as retryProductEnrichment } from '../../../src/handlers/products/retryProductEnrichment';
import { handler as batchRetryProducts } from '../../../src/handlers/products/batchRetryProducts';
import { handler as getProductStatistics } from '../../../src/handlers/products/getProductStatistics';
import { handler as checkUpcAvailability } from '../../../src/handlers/products/checkUpcAvailability';
import { handler as bulkImportProducts } from '../../../src/handlers/products/bulkImportProducts';
import { handler as bulkDeleteProducts } from '../../../src/handlers/products/bulkDeleteProducts';
import { getServiceContainer } from '../../../src/lib/container';
import { TestContainer, buildTestContainer, parseBody } from '../../support/container';
import { buildContext, buildEvent } from '../../support/events';
import { FIXED_NOW, admin, adminClaims, alice, aliceClaims, makeProduct } from '../../support/fixtures';

jest.mock('../../../src/lib/logger');
jest.mock('../../../src/lib/container', () => ({
  ...jest.requireActual<typeof import('../../../src/lib/container')>('../../../src/lib/container'),
  getServiceContainer: jest.fn(),
}));

const oatsFound = {
  status: 1,
  product: { product_name: 'Rolled Oats', brands: 'Mill Co', categories: 'Cereals, Breakfasts' },
};

describe('product handlers', () => {
  let container: TestContainer;

  beforeEach(() => {
    container = buildTestContainer();
    const { repos } = container;
    repos.users.items.set(alice.id, alice);
    repos.users.items.set(admin.id, admin);
    repos.products.items.set('product-nutella', makeProduct());
    jest.mocked(getServiceContainer).mockReturnValue(container.services);
  });

  describe('POST /products', () => {
    it('should create an enriched product', async () => {
      container.http.reply(200, oatsFound);

      const result = await createProduct(
        buildEvent({ claims: aliceClaims, httpMethod: 'POST', body: { upc: '012345678905', name: 'Oats' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(201);
      expect(parseBody(result)).toEqual({
        data: {
          id: 'product-1',
          upc: '012345678905',
          name: 'Rolled Oats',
          brand: 'Mill Co',
          category: 'Cereals',
          defaultExpirationDays: null,
          dataSource: 'EXTERNAL_API',
          requiresApiRetry: false,
          retryAttempts: 0,
          lastRetryAttempt: null,
          createdAt: FIXED_NOW,
          updatedAt: FIXED_NOW,
        },
        message: 'Product created successfully',
      });
    });

    it('should create a manual entry when the lookup is down', async () => {
      container.http.reply(503, 'Service Unavailable');

      const result = await createProduct(
        buildEvent({ claims: aliceClaims, httpMethod: 'POST', body: { upc: '012345678905', name: 'Oats' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(201);
      expect(parseBody(result)).toMatchObject({
        data: { name: 'Oats', dataSource: 'MANUAL', requiresApiRetry: true, retryAttempts: 0 },
      });
    });

    it('should answer 409 for a known UPC', async () => {
      const result = await createProduct(
        buildEvent({ claims: aliceClaims, httpMethod: 'POST', body: { upc: '3017624010701', name: 'Nutella' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(409);
      expect(parseBody(result)).toEqual({
        error: { code: 'CONFLICT', message: 'Product with UPC "3017624010701" already exists' },
      });
      expect(container.http.requests).toHaveLength(0);
    });

    it('should answer 400 for malformed JSON', async () => {
      const result = await createProduct(
        buildEvent({ claims: aliceClaims, httpMethod: 'POST', body: '{"upc":' }),
        buildContext()
      );

      expect(result.statusCode).toBe(400);
      expect(parseBody(result)).toMatchObject({ error: { message: 'Invalid JSON in request body' } });
    });
  });

  describe('reads', () => {
    it('should return a product by id', async () => {
      const result = await getProduct(
        buildEvent({ claims: aliceClaims, pathParameters: { productId: 'product-nutella' } }),
        buildContext()
      );

      expect(parseBody(result)).toEqual({ data: makeProduct() });
    });

    it('should return a product by UPC', async () => {
      const result = await getProductByUpc(
        buildEvent({ claims: aliceClaims, pathParameters: { upc: '3017624010701' } }),
        buildContext()
      );

      expect(parseBody(result)).toMatchObject({ data: { id: 'product-nutella' } });
    });

    it('should page the catalog without filters', async () => {
      const result = await listProducts(buildEvent({ claims: aliceClaims }), buildContext());

      expect(parseBody(result)).toEqual({
        data: { content: [makeProduct()], page: 0, size: 20, totalElements: 1, totalPages: 1 },
      });
    });

    it('should filter by category', async () => {
      const result = await listProducts(
        buildEvent({ claims: aliceClaims, queryStringParameters: { category: 'Dairy' } }),
        buildContext()
      );

      expect(parseBody(result)).toEqual({ data: [] });
    });

    it('should answer 400 for an unknown data source', async () => {
      const result = await listProducts(
        buildEvent({ claims: aliceClaims, queryStringParameters: { dataSource: 'SCANNER' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(400);
      expect(parseBody(result)).toMatchObject({ error: { code: 'VALIDATION_ERROR' } });
    });

    it('should report catalog statistics', async () => {
      const result = await getProductStatistics(buildEvent({ claims: aliceClaims }), buildContext());

      expect(parseBody(result)).toEqual({ data: { total: 1, manual: 0, api: 1, requiresRetry: 0 } });
    });

    it('should report UPC validity and availability separately', async () => {
      const result = await checkUpcAvailability(
        buildEvent({ claims: aliceClaims, pathParameters: { upc: '12AB' } }),
        buildContext()
      );

      expect(parseBody(result)).toEqual({ data: { upc: '12AB', valid: false, available: true } });
    });
  });

  describe('admin operations', () => {
    it('should answer 403 when a regular user patches a product', async () => {
      const result = await patchProduct(
        buildEvent({
          claims: aliceClaims,
          httpMethod: 'PATCH',
          pathParameters: { productId: 'product-nutella' },
          body: { name: 'Spread' },
        }),
        buildContext()
      );

      expect(result.statusCode).toBe(403);
      expect(parseBody(result)).toEqual({
        error: { code: 'INSUFFICIENT_PERMISSION', message: 'Admin role required to patch products' },
      });
    });

    it('should let an admin patch a product', async () => {
      const result = await patchProduct(
        buildEvent({
          claims: adminClaims,
          httpMethod: 'PATCH',
          pathParameters: { productId: 'product-nutella' },
          body: { defaultExpirationDays: 90 },
        }),
        buildContext()
      );

      expect(parseBody(result)).toMatchObject({
        data: { defaultExpirationDays: 90 },
        message: 'Product updated successfully',
      });
    });

    it('should retry enrichment and say when the product is still unknown', async () => {
      container.repos.products.items.set(
        'product-oats',
        makeProduct({ id: 'product-oats', upc: '012345678905', name: 'Oats', dataSource: 'MANUAL', requiresApiRetry: true })
      );
      container.http.reply(200, { status: 0 });

      const result = await retryProductEnrichment(
        buildEvent({ claims: adminClaims, httpMethod: 'POST', pathParameters: { productId: 'product-oats' } }),
        buildContext()
      );

      expect(parseBody(result)).toMatchObject({
        data: { retryAttempts: 1, lastRetryAttempt: FIXED_NOW },
        message: 'Product still not found in UPC API',
      });
    });

    it('should answer 422 once retries are used up', async () => {
      container.repos.products.items.set(
        'product-oats',
        makeProduct({ id: 'product-oats', upc: '012345678905', requiresApiRetry: true, retryAttempts: 5 })
      );

      const result = await retryProductEnrichment(
        buildEvent({ claims: adminClaims, httpMethod: 'POST', pathParameters: { productId: 'product-oats' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(422);
    });

    it('should answer 502 when the retry lookup fails', async () => {
      container.repos.products.items.set(
        'product-oats',
        makeProduct({ id: 'product-oats', upc: '012345678905', requiresApiRetry: true, retryAttempts: 1 })
      );
      container.http.reply(404, '');

      const result = await retryProductEnrichment(
        buildEvent({ claims: adminClaims, httpMethod: 'POST', pathParameters: { productId: 'product-oats' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(502);
      expect(parseBody(result)).toMatchObject({ error: { code: 'EXTERNAL_SERVICE_ERROR' } });
      expect(container.repos.products.items.get('product-oats')?.retryAttempts).toBe(2);
    });

    it('should report how many products a batch retry enriched', async () => {
      container.repos.products.items.set(
        'product-oats',
        makeProduct({ id: 'product-oats', upc: '012345678905', requiresApiRetry: true, retryAttempts: 1 })
      );
      container.http.reply(200, oatsFound);

      const result = await batchRetryProducts(
        buildEvent({ claims: adminClaims, httpMethod: 'POST' }),
        buildContext()
      );

      expect(parseBody(result)).toEqual({ data: { enriched: 1 } });
    });

    it('should import products and report the count', async () => {
      container.http.reply(200, { status: 0 });

      const result = await bulkImportProducts(
        buildEvent({
          claims: adminClaims,
          httpMethod: 'POST',
          body: [
            { upc: '012345678905', name: 'Oats' },
            { upc: '3017624010701', name: 'Nutella' },
          ],
        }),
        buildContext()
      );

      expect(result.statusCode).toBe(200);
      expect(parseBody(result)).toMatchObject({ message: 'Imported 1 of 2 products' });
    });

    it('should answer 400 for an empty import', async () => {
      const result = await bulkImportProducts(
        buildEvent({ claims: adminClaims, httpMethod: 'POST', body: [] }),
        buildContext()
      );

      expect(result.statusCode).toBe(400);
      expect(parseBody(result)).toMatchObject({ error: { message: 'Product requests list cannot be empty' } });
    });

    it('should bulk delete known products', async () => {
      const result = await bulkDeleteProducts(
        buildEvent({
          claims: adminClaims,
          httpMethod: 'DELETE',
          body: { productIds: ['product-nutella', 'product-missing'] },
        }),
        buildContext()
      );

      expect(parseBody(result)).toEqual({ data: { deleted: 1 } });
    });

    it('should delete a single product', async () => {
      const result = await deleteProduct(
        buildEvent({ claims: adminClaims, httpMethod: 'DELETE', pathParameters: { productId: 'product-nutella' } }),
        buildContext()
      );

      expect(result.statusCode).toBe(204);
      expect(container.repos.products.items.size).toBe(0);
    });
  });
});
