import { v4 as uuidv4 } from 'uuid';
import { ConflictError, NotFoundError } from '../lib/errors';
import type { Page, PageRequest, ProductRepository, ProductSortField } from '../repositories/types';
import { GSI1, GSI2, KeyBuilder, Product, ProductDataSource, ProductInput } from '../types/entities';
import { ProductRecordSchema } from '../types/schemas';
import { isConditionalCheckFailure } from '../lib/dynamodb';
import { DynamoModel } from './base';

const CATALOG_QUERY = {
  IndexName: GSI2,
  KeyConditionExpression: 'GSI2PK = :pk',
  ExpressionAttributeValues: { ':pk': 'CATALOG' },
};

/**
 * Null values sort after everything else in either direction
 */
export const compareProducts = (
  a: Product,
  b: Product,
  field: ProductSortField,
  direction: 'asc' | 'desc'
): number => {
  const left = a[field];
  const right = b[field];
  if (left === right) return 0;
  if (left === null) return 1;
  if (right === null) return -1;
  const order = left.localeCompare(right);
  return direction === 'asc' ? order : -order;
};

/**
 * Product Model
 * The catalog shares one GSI2 partition; GSI1 resolves a UPC
 */
export class ProductModel extends DynamoModel<Product> implements ProductRepository {
  protected override readonly entityType = 'Product' as const;
  protected override readonly schema = ProductRecordSchema;

  findById(id: string): Promise<Product | null> {
    const { PK, SK } = KeyBuilder.product(id, '');
    return this.run('get product', { productId: id }, () => this.getItem({ PK, SK }));
  }

  findByUpc(upc: string): Promise<Product | null> {
    return this.run('get product by UPC', { upc }, () =>
      this.queryFirst({
        IndexName: GSI1,
        KeyConditionExpression: 'GSI1PK = :pk',
        ExpressionAttributeValues: { ':pk': `UPC#${upc}` },
      })
    );
  }

  async findByNameContainingIgnoreCase(term: string): Promise<Product[]> {
    const needle = term.toLowerCase();
    return (await this.catalog()).filter((product) => product.name.toLowerCase().includes(needle));
  }

  async findByCategory(category: string): Promise<Product[]> {
    return (await this.catalog()).filter((product) => product.category === category);
  }

  async findByBrand(brand: string): Promise<Product[]> {
    return (await this.catalog()).filter((product) => product.brand === brand);
  }

  async findByDataSource(dataSource: ProductDataSource): Promise<Product[]> {
    return (await this.catalog()).filter((product) => product.dataSource === dataSource);
  }

  async findByRequiresApiRetryTrue(): Promise<Product[]> {
    return (await this.catalog()).filter((product) => product.requiresApiRetry);
  }

  async findByRequiresApiRetryTrueAndRetryAttemptsLessThan(maxAttempts: number): Promise<Product[]> {
    return (await this.catalog()).filter(
      (product) => product.requiresApiRetry && product.retryAttempts < maxAttempts
    );
  }

  async findAll(pageRequest: PageRequest): Promise<Page<Product>> {
    const { page, size, sort, direction } = pageRequest;
    const sorted = (await this.catalog()).sort((a, b) => compareProducts(a, b, sort, direction));
    const start = page * size;
    return {
      content: sorted.slice(start, start + size),
      page,
      size,
      totalElements: sorted.length,
      totalPages: Math.ceil(sorted.length / size),
    };
  }

  count(): Promise<number> {
    return this.run('count products', {}, () => this.countAll(CATALOG_QUERY));
  }

  async create(input: ProductInput): Promise<Product> {
    const now = new Date().toISOString();
    const product: Product = { id: uuidv4(), ...input, createdAt: now, updatedAt: now };

    try {
      await this.putItem(this.toItem(product), 'attribute_not_exists(PK)');
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new ConflictError(`Product with ID "${product.id}" already exists`);
      }
      throw error;
    }

    return product;
  }

  async save(product: Product): Promise<Product> {
    const saved: Product = { ...product, updatedAt: new Date().toISOString() };
    try {
      await this.putItem(this.toItem(saved), 'attribute_exists(PK)');
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new NotFoundError('Product', product.id);
      }
      throw error;
    }
    return saved;
  }

  delete(product: Product): Promise<void> {
    const { PK, SK } = KeyBuilder.product(product.id, product.upc);
    return this.run('delete product', { productId: product.id }, () => this.deleteItem({ PK, SK }));
  }

  private catalog(): Promise<Product[]> {
    return this.run('list catalog', {}, () => this.queryAll(CATALOG_QUERY));
  }

  private toItem(product: Product): Record<string, unknown> {
    return {
      ...KeyBuilder.product(product.id, product.upc),
      entityType: this.entityType,
      ...product,
    };
  }
}
