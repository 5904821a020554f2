/**
 * Unit Tests for DynamoDB client configuration
 */

import { buildClientConfig, getTableName, isConditionalCheckFailure } from '../../../src/lib/dynamodb';
import { ConfigurationError } from '../../../src/lib/errors';

describe('buildClientConfig', () => {
  it('should target AWS in the configured region', () => {
    expect(buildClientConfig({ AWS_REGION: 'eu-west-1' })).toEqual({ region: 'eu-west-1', maxAttempts: 3 });
  });

  it('should default the region', () => {
    expect(buildClientConfig({})).toEqual({ region: 'us-east-1', maxAttempts: 3 });
  });

  it('should point at an explicit local endpoint with static credentials', () => {
    expect(buildClientConfig({ DYNAMODB_ENDPOINT: 'http://localhost:8000' })).toEqual({
      region: 'us-east-1',
      maxAttempts: 3,
      endpoint: 'http://localhost:8000',
      tls: false,
      credentials: { accessKeyId: 'local', secretAccessKey: 'local' },
    });
  });

  it('should reach DynamoDB Local through the docker host under SAM local', () => {
    expect(buildClientConfig({ AWS_SAM_LOCAL: 'true' })).toMatchObject({
      endpoint: 'http://host.docker.internal:8000',
    });
  });
});

describe('getTableName', () => {
  it('should read TABLE_NAME', () => {
    expect(getTableName({ TABLE_NAME: 'inventory' })).toBe('inventory');
  });

  it('should fail with a configuration error when unset', () => {
    expect(() => getTableName({})).toThrow(ConfigurationError);
    expect(() => getTableName({})).toThrow('Invalid configuration for TABLE_NAME: environment variable is not set');
  });
});

describe('isConditionalCheckFailure', () => {
  it('should recognise the conditional check exception by name', () => {
    const error = Object.assign(new Error('The conditional request failed'), {
      name: 'ConditionalCheckFailedException',
    });

    expect(isConditionalCheckFailure(error)).toBe(true);
    expect(isConditionalCheckFailure(new Error('throttled'))).toBe(false);
    expect(isConditionalCheckFailure('ConditionalCheckFailedException')).toBe(false);
  });
});
