import type { APIGatewayProxyEvent } from 'aws-lambda';
import type { TokenClaims } from '../../lib/auth';
import type { ServiceContainer } from '../../lib/container';
import { createHandler } from '../../lib/handler';
import { queryParam, queryParams } from '../../lib/request';
import { okResponse } from '../../lib/response';
import { parseRequest } from '../../lib/validation';
import { PageRequestSchema, ProductDataSourceSchema } from '../../types/schemas';

/**
 * One filter applies per request, checked in this order:
 * name, category, brand, dataSource, requiresRetry, maxRetryAttempts.
 * Without a filter the catalog is returned a page at a time.
 */
const listProducts = async (
  event: APIGatewayProxyEvent,
  claims: TokenClaims,
  { productService }: ServiceContainer
) => {
  const name = queryParam(event, 'name');
  if (name !== undefined) {
    return productService.searchProductsByName(claims, name);
  }
  const category = queryParam(event, 'category');
  if (category !== undefined) {
    return productService.getProductsByCategory(claims, category);
  }
  const brand = queryParam(event, 'brand');
  if (brand !== undefined) {
    return productService.getProductsByBrand(claims, brand);
  }
  const dataSource = queryParam(event, 'dataSource');
  if (dataSource !== undefined) {
    return productService.getProductsByDataSource(claims, parseRequest(ProductDataSourceSchema, dataSource));
  }
  if (queryParam(event, 'requiresRetry') === 'true') {
    return productService.getProductsRequiringRetry(claims);
  }
  const maxRetryAttempts = queryParam(event, 'maxRetryAttempts');
  if (maxRetryAttempts !== undefined) {
    return productService.getProductsEligibleForRetry(claims, Number(maxRetryAttempts));
  }

  return productService.getAllProducts(claims, parseRequest(PageRequestSchema, queryParams(event)));
};

/**
 * GET /products
 */
export const handler = createHandler('listProducts', async ({ event, claims, services }) => {
  return okResponse(await listProducts(event, claims, services));
});
