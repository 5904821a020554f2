/**
 * DynamoDB document client for the single household-inventory table
 *
 * DYNAMODB_ENDPOINT (or AWS_SAM_LOCAL) points the client at DynamoDB Local.
 */

import { DynamoDBClient, DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, TranslateConfig } from '@aws-sdk/lib-dynamodb';
import { ConfigurationError } from './errors';

const SAM_LOCAL_ENDPOINT = 'http://host.docker.internal:8000';

const TRANSLATE_CONFIG: TranslateConfig = {
  marshallOptions: {
    removeUndefinedValues: true,
    convertEmptyValues: false,
    convertClassInstanceToMap: true,
  },
  unmarshallOptions: { wrapNumbers: false },
};

/**
 * The slice of the document client the models call, so tests can pass a fake
 */
export type DocumentClient = Pick<DynamoDBDocumentClient, 'send'>;

export const buildClientConfig = (env: NodeJS.ProcessEnv = process.env): DynamoDBClientConfig => {
  const endpoint = env['DYNAMODB_ENDPOINT'] || (env['AWS_SAM_LOCAL'] === 'true' ? SAM_LOCAL_ENDPOINT : undefined);
  const config: DynamoDBClientConfig = {
    region: env['AWS_REGION'] || 'us-east-1',
    maxAttempts: 3,
  };
  if (!endpoint) {
    return config;
  }
  // DynamoDB Local accepts any static credentials
  return {
    ...config,
    endpoint,
    tls: false,
    credentials: { accessKeyId: 'local', secretAccessKey: 'local' },
  };
};

let docClient: DynamoDBDocumentClient | undefined;

/**
 * Created on first use and kept for warm invocations
 */
export const getDocClient = (): DocumentClient => {
  if (!docClient) {
    docClient = DynamoDBDocumentClient.from(new DynamoDBClient(buildClientConfig()), TRANSLATE_CONFIG);
  }
  return docClient;
};

export const getTableName = (env: NodeJS.ProcessEnv = process.env): string => {
  const tableName = env['TABLE_NAME'];
  if (!tableName) {
    throw new ConfigurationError('TABLE_NAME', 'environment variable is not set');
  }
  return tableName;
};

export const isConditionalCheckFailure = (error: unknown): boolean =>
  error instanceof Error && error.name === 'ConditionalCheckFailedException';
