import { v4 as uuidv4 } from 'uuid';
import { ConflictError, NotFoundError } from '../lib/errors';
import type { HouseholdMemberRepository } from '../repositories/types';
import { GSI1, HouseholdMember, HouseholdMemberInput, KeyBuilder } from '../types/entities';
import { HouseholdMemberRecordSchema } from '../types/schemas';
import { isConditionalCheckFailure } from '../lib/dynamodb';
import { DynamoModel } from './base';

/**
 * HouseholdMember Model
 * Memberships live in the household partition and are indexed by user on GSI1
 */
export class HouseholdMemberModel
  extends DynamoModel<HouseholdMember>
  implements HouseholdMemberRepository
{
  protected override readonly entityType = 'HouseholdMember' as const;
  protected override readonly schema = HouseholdMemberRecordSchema;

  findByHouseholdIdAndUserId(householdId: string, userId: string): Promise<HouseholdMember | null> {
    const { PK, SK } = KeyBuilder.member(householdId, userId);
    return this.run('get household member', { householdId, userId }, () => this.getItem({ PK, SK }));
  }

  findByUserId(userId: string): Promise<HouseholdMember[]> {
    return this.run('list memberships of user', { userId }, () =>
      this.queryAll({
        IndexName: GSI1,
        KeyConditionExpression: 'GSI1PK = :pk AND begins_with(GSI1SK, :sk)',
        ExpressionAttributeValues: { ':pk': `USER#${userId}`, ':sk': 'HOUSEHOLD#' },
      })
    );
  }

  findByHouseholdId(householdId: string): Promise<HouseholdMember[]> {
    return this.run('list household members', { householdId }, () =>
      this.queryAll({
        KeyConditionExpression: 'PK = :pk AND begins_with(SK, :sk)',
        ExpressionAttributeValues: { ':pk': `HOUSEHOLD#${householdId}`, ':sk': 'MEMBER#' },
      })
    );
  }

  async create(input: HouseholdMemberInput): Promise<HouseholdMember> {
    const now = new Date().toISOString();
    const member: HouseholdMember = {
      id: uuidv4(),
      householdId: input.householdId,
      userId: input.userId,
      role: input.role,
      createdAt: now,
      updatedAt: now,
    };

    try {
      await this.putItem(this.toItem(member), 'attribute_not_exists(PK)');
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new ConflictError('User is already a member of this household');
      }
      throw error;
    }
    return member;
  }

  async save(member: HouseholdMember): Promise<HouseholdMember> {
    const saved: HouseholdMember = { ...member, updatedAt: new Date().toISOString() };
    try {
      await this.putItem(this.toItem(saved), 'attribute_exists(PK)');
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new NotFoundError('HouseholdMember', member.id);
      }
      throw error;
    }
    return saved;
  }

  delete(member: HouseholdMember): Promise<void> {
    const { PK, SK } = KeyBuilder.member(member.householdId, member.userId);
    return this.run('delete household member', { householdId: member.householdId, userId: member.userId }, () =>
      this.deleteItem({ PK, SK })
    );
  }

  private toItem(member: HouseholdMember): Record<string, unknown> {
    return {
      ...KeyBuilder.member(member.householdId, member.userId),
      entityType: this.entityType,
      ...member,
    };
  }
}
