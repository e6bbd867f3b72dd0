/**
 * DynamoDB table gateway.
 *
 * The narrow set of table calls the monkey store needs, implemented on the
 * document client. Numbers come back wrapped so no precision
 * is lost before the store normalizes them.
 */

import { ConditionalCheckFailedException, DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  paginateQuery,
  paginateScan,
} from "@aws-sdk/lib-dynamodb";
import { ExpressionBuilder, where } from "./conditions.js";
import type { Condition } from "./conditions.js";

export type TableItem = Record<string, unknown>;

export interface ItemKey {
  PK: string;
  SK: string;
}

export interface QueryRequest {
  indexName: string;

  /** Equality on the index partition key */
  partitionKey: { attribute: string; value: string };

  /** Optional sort-key condition */
  sortKey?: Condition | undefined;

  /** Applied after the key condition, before results are returned */
  filter?: Condition | undefined;
}

export interface ScanRequest {
  filter?: Condition | undefined;
  consistentRead?: boolean | undefined;
}

/**
 * Table operations used by the DynamoDB store.
 */
export interface KeyValueTable {
  /** Put an item; false when `condition` rejected the write */
  putItem(item: TableItem, condition?: Condition): Promise<boolean>;

  getItem(key: ItemKey, consistentRead?: boolean): Promise<TableItem | undefined>;

  /** Delete an item, returning what was stored (undefined when nothing was) */
  deleteItem(key: ItemKey): Promise<TableItem | undefined>;

  /** Query a secondary index, following every page */
  query(request: QueryRequest): Promise<TableItem[]>;

  /** Scan the table, following every page */
  scan(request: ScanRequest): Promise<TableItem[]>;

  destroy(): void;
}

export interface DocumentTableOptions {
  tableName: string;
  region: string;

  /** Override endpoint, e.g. a local DynamoDB */
  endpoint?: string | undefined;

  /** Pre-built client; one is created from region/endpoint otherwise */
  client?: DynamoDBDocumentClient | undefined;
}

function isConditionFailure(err: unknown): boolean {
  return (
    err instanceof ConditionalCheckFailedException ||
    (err instanceof Error && err.name === "ConditionalCheckFailedException")
  );
}

function placeholders(builder: ExpressionBuilder) {
  const names = builder.attributeNames;
  const values = builder.attributeValues;
  return {
    ...(names ? { ExpressionAttributeNames: names } : {}),
    ...(values ? { ExpressionAttributeValues: values } : {}),
  };
}

/**
 * Create a document client configured for the gateway.
 */
export function createDocumentClient(region: string, endpoint?: string): DynamoDBDocumentClient {
  const client = new DynamoDBClient({ region, ...(endpoint ? { endpoint } : {}) });
  return DynamoDBDocumentClient.from(client, {
    marshallOptions: { removeUndefinedValues: true },
    unmarshallOptions: { wrapNumbers: true },
  });
}

/**
 * Create a table gateway backed by the DynamoDB document client.
 */
export function createDocumentTable(options: DocumentTableOptions): KeyValueTable {
  const { tableName } = options;
  const client = options.client ?? createDocumentClient(options.region, options.endpoint);

  return {
    async putItem(item: TableItem, condition?: Condition): Promise<boolean> {
      const builder = new ExpressionBuilder();
      const conditionExpression = condition ? builder.compile(condition) : undefined;
      try {
        await client.send(
          new PutCommand({
            TableName: tableName,
            Item: item,
            ...(conditionExpression ? { ConditionExpression: conditionExpression } : {}),
            ...placeholders(builder),
          })
        );
        return true;
      } catch (err) {
        if (isConditionFailure(err)) return false;
        throw err;
      }
    },

    async getItem(key: ItemKey, consistentRead = false): Promise<TableItem | undefined> {
      const result = await client.send(
        new GetCommand({ TableName: tableName, Key: { ...key }, ConsistentRead: consistentRead })
      );
      return result.Item;
    },

    async deleteItem(key: ItemKey): Promise<TableItem | undefined> {
      const result = await client.send(
        new DeleteCommand({ TableName: tableName, Key: { ...key }, ReturnValues: "ALL_OLD" })
      );
      return result.Attributes;
    },

    async query(request: QueryRequest): Promise<TableItem[]> {
      const builder = new ExpressionBuilder();
      const { attribute, value } = request.partitionKey;
      let keyCondition = builder.compile(where.eq(attribute, value));
      if (request.sortKey) {
        keyCondition = `${keyCondition} AND ${builder.compile(request.sortKey)}`;
      }
      const filter = request.filter ? builder.compile(request.filter) : undefined;

      const items: TableItem[] = [];
      const pages = paginateQuery(
        { client },
        {
          TableName: tableName,
          IndexName: request.indexName,
          KeyConditionExpression: keyCondition,
          ...(filter ? { FilterExpression: filter } : {}),
          ...placeholders(builder),
        }
      );
      for await (const page of pages) {
        items.push(...(page.Items ?? []));
      }
      return items;
    },

    async scan(request: ScanRequest): Promise<TableItem[]> {
      const builder = new ExpressionBuilder();
      const filter = request.filter ? builder.compile(request.filter) : undefined;

      const items: TableItem[] = [];
      const pages = paginateScan(
        { client },
        {
          TableName: tableName,
          ConsistentRead: request.consistentRead ?? false,
          ...(filter ? { FilterExpression: filter } : {}),
          ...placeholders(builder),
        }
      );
      for await (const page of pages) {
        items.push(...(page.Items ?? []));
      }
      return items;
    },

    destroy(): void {
      client.destroy();
    },
  };
}
