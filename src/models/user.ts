import { ConflictError, NotFoundError } from '../lib/errors';
import type { UserRepository } from '../repositories/types';
import { GSI1, GSI2, KeyBuilder, User, UserInput } from '../types/entities';
import { UserRecordSchema } from '../types/schemas';
import { isConditionalCheckFailure } from '../lib/dynamodb';
import { DynamoModel } from './base';

/**
 * User Model
 * Handles DynamoDB operations for User entities
 */
export class UserModel extends DynamoModel<User> implements UserRepository {
  protected override readonly entityType = 'User' as const;
  protected override readonly schema = UserRecordSchema;

  findById(id: string): Promise<User | null> {
    const { PK, SK } = KeyBuilder.user(id, '', '');
    return this.run('get user', { userId: id }, () => this.getItem({ PK, SK }));
  }

  findByUsername(username: string): Promise<User | null> {
    return this.run('get user by username', { username }, () =>
      this.queryFirst({
        IndexName: GSI1,
        KeyConditionExpression: 'GSI1PK = :pk',
        ExpressionAttributeValues: { ':pk': `USERNAME#${username}` },
      })
    );
  }

  findByEmail(email: string): Promise<User | null> {
    return this.run('get user by email', { email }, () =>
      this.queryFirst({
        IndexName: GSI2,
        KeyConditionExpression: 'GSI2PK = :pk',
        ExpressionAttributeValues: { ':pk': `EMAIL#${email}` },
      })
    );
  }

  async create(input: UserInput): Promise<User> {
    const now = new Date().toISOString();
    const user: User = {
      id: input.id,
      username: input.username,
      email: input.email,
      displayName: input.displayName,
      role: input.role ?? 'USER',
      createdAt: now,
      updatedAt: now,
    };

    try {
      await this.putItem(this.toItem(user), 'attribute_not_exists(PK)');
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new ConflictError(`User with ID "${input.id}" already exists`);
      }
      throw error;
    }

    return user;
  }

  async save(user: User): Promise<User> {
    const saved: User = { ...user, updatedAt: new Date().toISOString() };
    try {
      await this.putItem(this.toItem(saved), 'attribute_exists(PK)');
    } catch (error) {
      if (isConditionalCheckFailure(error)) {
        throw new NotFoundError('User', user.id);
      }
      throw error;
    }
    return saved;
  }

  delete(user: User): Promise<void> {
    const { PK, SK } = KeyBuilder.user(user.id, user.username, user.email);
    return this.run('delete user', { userId: user.id }, () => this.deleteItem({ PK, SK }));
  }

  private toItem(user: User): Record<string, unknown> {
    return {
      ...KeyBuilder.user(user.id, user.username, user.email),
      entityType: this.entityType,
      ...user,
    };
  }
}
