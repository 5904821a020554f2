import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../lib/errors';
import type { HouseholdRepository } from '../repositories/types';
import { Household, HouseholdInput, KeyBuilder } from '../types/entities';
import { HouseholdRecordSchema } from '../types/schemas';
import { isConditionalCheckFailure } from '../lib/dynamodb';
import { DynamoModel } from './base';

/**
 * Household Model
 * Handles DynamoDB operations for Household entities
 */
export class HouseholdModel extends DynamoModel<Household> implements HouseholdRepository {
  protected override readonly entityType = 'Household' as const;
  protected override readonly schema = HouseholdRecordSchema;

  findById(id: string): Promise<Household | null> {
    return this.run('get household', { householdId: id }, () => this.getItem(KeyBuilder.household(id)));
  }

  async existsById(id: string): Promise<boolean> {
    return (await this.findById(id)) !== null;
  }

  create(input: HouseholdInput): Promise<Household> {
    const now = new Date().toISOString();
    const household: Household = {
      id: uuidv4(),
      name: input.name,
      createdAt: now,
      updatedAt: now,
    };

    return this.run('create household', { name: input.name }, async () => {
      await this.putItem(this.toItem(household), 'attribute_not_exists(PK)');
      return household;
    });
  }

  async save(household: Household): Promise<Household> {
    const saved: Household = { ...household, updatedAt: new Date().toISOString() };
    try {
      await this.putItem(this.toItem(saved), 'attribute_exists(PK)');
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new NotFoundError('Household', household.id);
      }
      throw error;
    }
    return saved;
  }

  delete(household: Household): Promise<void> {
    return this.run('delete household', { householdId: household.id }, () =>
      this.deleteItem(KeyBuilder.household(household.id))
    );
  }

  private toItem(household: Household): Record<string, unknown> {
    return {
      ...KeyBuilder.household(household.id),
      entityType: this.entityType,
      ...household,
    };
  }
}
