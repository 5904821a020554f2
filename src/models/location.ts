import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../lib/errors';
import type { LocationRepository } from '../repositories/types';
import { GSI1, KeyBuilder, Location, LocationInput } from '../types/entities';
import { LocationRecordSchema } from '../types/schemas';
import { isConditionalCheckFailure } from '../lib/dynamodb';
import { DynamoModel } from './base';

const byName = (a: Location, b: Location): number => a.name.localeCompare(b.name);

/**
 * Location Model
 * Locations live in their household partition; GSI1 resolves a location id alone
 */
export class LocationModel extends DynamoModel<Location> implements LocationRepository {
  protected override readonly entityType = 'Location' as const;
  protected override readonly schema = LocationRecordSchema;

  findById(id: string): Promise<Location | null> {
    return this.run('get location', { locationId: id }, () =>
      this.queryFirst({
        IndexName: GSI1,
        KeyConditionExpression: 'GSI1PK = :pk',
        ExpressionAttributeValues: { ':pk': `LOCATION#${id}` },
      })
    );
  }

  async findByHouseholdId(householdId: string): Promise<Location[]> {
    const locations = await this.run('list locations', { householdId }, () =>
      this.queryAll({
        KeyConditionExpression: 'PK = :pk AND begins_with(SK, :sk)',
        ExpressionAttributeValues: { ':pk': `HOUSEHOLD#${householdId}`, ':sk': 'LOCATION#' },
      })
    );
    return locations.sort(byName);
  }

  /**
   * Exact, case-sensitive name match within the household
   */
  async existsByHouseholdIdAndName(householdId: string, name: string): Promise<boolean> {
    const locations = await this.findByHouseholdId(householdId);
    return locations.some((location) => location.name === name);
  }

  async searchByNameOrDescription(householdId: string, term: string): Promise<Location[]> {
    const needle = term.toLowerCase();
    const locations = await this.findByHouseholdId(householdId);
    return locations.filter(
      (location) =>
        location.name.toLowerCase().includes(needle) ||
        (location.description?.toLowerCase().includes(needle) ?? false)
    );
  }

  create(input: LocationInput): Promise<Location> {
    const now = new Date().toISOString();
    const location: Location = {
      id: uuidv4(),
      householdId: input.householdId,
      name: input.name,
      description: input.description,
      createdAt: now,
      updatedAt: now,
    };

    return this.run('create location', { householdId: input.householdId, name: input.name }, async () => {
      await this.putItem(this.toItem(location), 'attribute_not_exists(PK)');
      return location;
    });
  }

  async save(location: Location): Promise<Location> {
    const saved: Location = { ...location, updatedAt: new Date().toISOString() };
    try {
      await this.putItem(this.toItem(saved), 'attribute_exists(PK)');
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new NotFoundError('Location', location.id);
      }
      throw error;
    }
    return saved;
  }

  delete(location: Location): Promise<void> {
    const { PK, SK } = KeyBuilder.location(location.householdId, location.id);
    return this.run('delete location', { locationId: location.id }, () => this.deleteItem({ PK, SK }));
  }

  private toItem(location: Location): Record<string, unknown> {
    return {
      ...KeyBuilder.location(location.householdId, location.id),
      entityType: this.entityType,
      ...location,
    };
  }
}
