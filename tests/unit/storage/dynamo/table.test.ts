/**
 * Document-client table gateway. The client's `send` is stubbed, so no
 * request leaves the process.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { ConditionalCheckFailedException } from "@aws-sdk/client-dynamodb";
import { PutCommand, QueryCommand, ScanCommand } from "@aws-sdk/lib-dynamodb";
import { createDocumentClient, createDocumentTable } from "../../../../src/storage/dynamo/table.js";
import { where } from "../../../../src/storage/dynamo/conditions.js";

describe("createDocumentTable", () => {
  const client = createDocumentClient("eu-west-1");
  const table = createDocumentTable({ tableName: "monkeys", region: "eu-west-1", client });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports a failed put condition as a rejected write", async () => {
    vi.spyOn(client, "send").mockRejectedValue(
      new ConditionalCheckFailedException({ message: "The conditional request failed", $metadata: {} })
    );
    expect(await table.putItem({ PK: "MONKEY#a", SK: "MONKEY#a" }, where.notExists("PK"))).toBe(false);
  });

  it("sends the compiled put condition and rethrows other failures", async () => {
    const send = vi.spyOn(client, "send").mockRejectedValue(new Error("offline"));
    await expect(table.putItem({ PK: "MONKEY#a", SK: "MONKEY#a" }, where.notExists("PK"))).rejects.toThrow(
      "offline"
    );

    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(PutCommand);
    expect(command?.input).toEqual({
      TableName: "monkeys",
      Item: { PK: "MONKEY#a", SK: "MONKEY#a" },
      ConditionExpression: "attribute_not_exists(#n0)",
      ExpressionAttributeNames: { "#n0": "PK" },
    });
  });

  it("joins partition and sort key conditions for index queries", async () => {
    const send = vi.spyOn(client, "send").mockRejectedValue(new Error("offline"));
    await expect(
      table.query({
        indexName: "GSI_Species",
        partitionKey: { attribute: "species_lc", value: "marmoset" },
        sortKey: where.eq("name_lc", "luna"),
      })
    ).rejects.toThrow("offline");

    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(QueryCommand);
    expect(command?.input).toMatchObject({
      TableName: "monkeys",
      IndexName: "GSI_Species",
      KeyConditionExpression: "#n0 = :v0 AND #n1 = :v1",
      ExpressionAttributeNames: { "#n0": "species_lc", "#n1": "name_lc" },
      ExpressionAttributeValues: { ":v0": "marmoset", ":v1": "luna" },
    });
  });

  it("passes scan filters and read consistency", async () => {
    const send = vi.spyOn(client, "send").mockRejectedValue(new Error("offline"));
    await expect(
      table.scan({ filter: where.contains("name_lc", "lu"), consistentRead: true })
    ).rejects.toThrow("offline");

    const command = send.mock.calls[0]?.[0];
    expect(command).toBeInstanceOf(ScanCommand);
    expect(command?.input).toMatchObject({
      TableName: "monkeys",
      ConsistentRead: true,
      FilterExpression: "contains(#n0, :v0)",
    });
  });
});
