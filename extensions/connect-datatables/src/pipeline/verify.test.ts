import { describe, it, expect, vi } from "vitest";
import { verifyTables, VALUE_SAMPLE_SIZE } from "./verify.js";
import type { PipelineServices } from "./services.js";
import type { DeploymentConfig } from "../config/schema.js";
import type { Logger } from "../logger.js";

const CONFIG: DeploymentConfig = {
  instanceARN: "arn:aws:connect:ca-central-1:123456789012:instance/test-instance",
  dataTables: [{ name: "CustomerTypes" }, { name: "Missing" }, { name: "Broken" }],
};

function createMockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createServices() {
  const findTable = vi.fn(async (name: string) => {
    if (name === "Missing") return undefined;
    return { id: `id-${name}`, name };
  });
  const listAttributes = vi.fn(async (tableId: string) => {
    if (tableId === "id-Broken") throw new Error("AccessDeniedException: not authorized");
    return [
      { name: "Id", valueType: "TEXT", primary: true },
      { name: "Tier", valueType: "TEXT", primary: false },
    ];
  });
  const sampleValues = vi.fn(async () => 3);

  const services: PipelineServices = {
    tables: { findTable, ensureTable: vi.fn(), deleteTable: vi.fn() },
    attributes: { listAttributes, ensureAttributes: vi.fn() },
    values: { sampleValues, batchUpdate: vi.fn(), batchCreate: vi.fn(), fetchToken: vi.fn() },
  };
  return { services, sampleValues };
}

describe("verifyTables", () => {
  it("should report each configured table", async () => {
    const { services, sampleValues } = createServices();
    const logger = createMockLogger();

    const results = await verifyTables(CONFIG, services, logger);

    expect(results).toEqual([
      {
        table: "CustomerTypes",
        status: "found",
        tableId: "id-CustomerTypes",
        attributes: [
          { name: "Id", valueType: "TEXT", primary: true },
          { name: "Tier", valueType: "TEXT", primary: false },
        ],
        primaryKeys: ["Id"],
        sampledValues: 3,
      },
      { table: "Missing", status: "missing" },
      { table: "Broken", status: "failed", error: "AccessDeniedException: not authorized" },
    ]);
    expect(sampleValues).toHaveBeenCalledWith("id-CustomerTypes", VALUE_SAMPLE_SIZE);
    expect(logger.warn).toHaveBeenCalledWith("Data table Missing not found");
    expect(logger.error).toHaveBeenCalledWith("Verification of Broken failed: AccessDeniedException: not authorized");
  });
});
