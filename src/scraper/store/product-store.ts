import { Logger } from '@nestjs/common';
import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient, PutCommand } from '@aws-sdk/lib-dynamodb';
import { PersistenceError, errorMessage } from '../errors';
import { ProductItem, ProductKey } from '../interfaces/product.interface';

export interface ProductStore {
  /** Insert or overwrite the item stored under `key`. */
  upsert(key: ProductKey, item: ProductItem): Promise<void>;
}

export type DocumentClient = Pick<DynamoDBDocumentClient, 'send'>;

export function createDocumentClient(region: string): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient({ region }), {
    marshallOptions: { removeUndefinedValues: true },
  });
}

export class DynamoProductStore implements ProductStore {
  private readonly logger = new Logger(DynamoProductStore.name);

  constructor(
    private readonly tableName: string,
    private readonly client: DocumentClient,
  ) {}

  async upsert(key: ProductKey, item: ProductItem): Promise<void> {
    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: { ...item, ...key, tags: new Set(item.tags) },
        }),
      );
      this.logger.log(`Saved ${key.category}/${key.productID} to ${this.tableName}`);
    } catch (error) {
      throw new PersistenceError(
        `Failed to save ${key.category}/${key.productID} to ${this.tableName}: ${errorMessage(error)}`,
        error,
      );
    }
  }
}
