import {
  DeleteCommand,
  GetCommand,
  PutCommand,
  QueryCommand,
  QueryCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { z } from 'zod';
import { DocumentClient, getDocClient, getTableName } from '../lib/dynamodb';
import { DataIntegrityError, EntityType, toError } from '../lib/errors';
import { logger } from '../lib/logger';

export type ItemKey = { PK: string; SK: string };

type QueryInput = Omit<QueryCommandInput, 'TableName' | 'ExclusiveStartKey'>;

/**
 * Shared DynamoDB plumbing for the single-table models
 */
export abstract class DynamoModel<T> {
  protected abstract readonly entityType: EntityType;
  protected abstract readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(
    protected readonly client: DocumentClient = getDocClient(),
    protected readonly tableName: string = getTableName()
  ) {}

  /**
   * Validate a stored item and drop its key attributes
   */
  protected toEntity(item: Record<string, unknown>): T {
    const result = this.schema.safeParse(item);
    if (!result.success) {
      throw new DataIntegrityError(`Stored ${this.entityType} item is malformed`, { cause: result.error });
    }
    return result.data;
  }

  protected async getItem(key: ItemKey): Promise<T | null> {
    const result = await this.client.send(new GetCommand({ TableName: this.tableName, Key: key }));
    return result.Item ? this.toEntity(result.Item) : null;
  }

  /**
   * Run a query to exhaustion, following LastEvaluatedKey
   */
  protected async queryAll(input: QueryInput): Promise<T[]> {
    const entities: T[] = [];
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const result = await this.client.send(
        new QueryCommand({
          ...input,
          TableName: this.tableName,
          ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {}),
        })
      );
      for (const item of result.Items ?? []) {
        entities.push(this.toEntity(item));
      }
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return entities;
  }

  protected async queryFirst(input: QueryInput): Promise<T | null> {
    const result = await this.client.send(
      new QueryCommand({ ...input, TableName: this.tableName, Limit: 1 })
    );
    const item = result.Items?.[0];
    return item ? this.toEntity(item) : null;
  }

  protected async countAll(input: QueryInput): Promise<number> {
    let total = 0;
    let exclusiveStartKey: Record<string, unknown> | undefined;

    do {
      const result = await this.client.send(
        new QueryCommand({
          ...input,
          TableName: this.tableName,
          Select: 'COUNT',
          ...(exclusiveStartKey ? { ExclusiveStartKey: exclusiveStartKey } : {}),
        })
      );
      total += result.Count ?? 0;
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return total;
  }

  protected async putItem(item: Record<string, unknown>, condition: string): Promise<void> {
    await this.client.send(
      new PutCommand({
        TableName: this.tableName,
        Item: item,
        ConditionExpression: condition,
      })
    );
  }

  protected async deleteItem(key: ItemKey): Promise<void> {
    await this.client.send(new DeleteCommand({ TableName: this.tableName, Key: key }));
  }

  /**
   * Log a failed operation with its context and rethrow it unchanged
   */
  protected async run<R>(
    operation: string,
    context: Record<string, unknown>,
    action: () => Promise<R>
  ): Promise<R> {
    try {
      return await action();
    } catch (error) {
      logger.error(`Failed to ${operation}`, toError(error), context);
      throw error;
    }
  }
}
