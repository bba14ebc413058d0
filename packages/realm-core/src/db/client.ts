/**
 * DynamoDB Client
 *
 * 使用懒加载模式，在首次调用时读取环境变量初始化客户端。
 */

import type { DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { getTableName } from './constants';

/**
 * Build client config from the environment at call time
 */
function createClientConfig(): DynamoDBClientConfig {
  const region = process.env.AWS_REGION || 'ap-northeast-1';
  const dynamodbEndpoint = process.env.DYNAMODB_ENDPOINT;

  if (dynamodbEndpoint) {
    console.log(`[DynamoDB] Using local endpoint: ${dynamodbEndpoint}, table: ${getTableName()}`);
    return {
      endpoint: dynamodbEndpoint,
      region,
      credentials: {
        accessKeyId: 'local',
        secretAccessKey: 'local',
      },
    };
  }
  return { region };
}

let _dynamoDbClient: DynamoDBClient | null = null;
let _docClient: DynamoDBDocumentClient | null = null;

/**
 * Create a new raw client (not cached)
 */
function createDynamoDBClient(config: DynamoDBClientConfig = createClientConfig()): DynamoDBClient {
  return new DynamoDBClient(config);
}

/**
 * Wrap a raw client in a Document client
 */
function createDocClient(client: DynamoDBClient): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
      convertEmptyValues: false,
    },
    unmarshallOptions: {
      wrapNumbers: false,
    },
  });
}

/**
 * 获取 DynamoDB 原始客户端（懒加载）
 */
function getDynamoDBClient(): DynamoDBClient {
  if (!_dynamoDbClient) {
    _dynamoDbClient = createDynamoDBClient();
  }
  return _dynamoDbClient;
}

/**
 * 获取 DynamoDB Document 客户端（懒加载）
 */
export function getDocClient(): DynamoDBDocumentClient {
  if (!_docClient) {
    _docClient = createDocClient(getDynamoDBClient());
  }
  return _docClient;
}

/**
 * Drop cached clients so the next call re-reads the environment
 */
export function resetClients(): void {
  _dynamoDbClient = null;
  _docClient = null;
}
