/**
 * Deployment Pipeline Tests
 */

import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { DeploymentPipeline, createDeploymentPipeline } from "./deploy.js";
import type { PipelineServices } from "./services.js";
import type { LoadedDeploymentConfig } from "../config/loader.js";
import type { DeploymentConfig } from "../config/schema.js";
import { DataTableError } from "../errors.js";
import { MockDataTableService, type MockServiceConfig } from "../reconciliation/mock-remote.js";
import type { TableSpec } from "../types.js";

class MockValueService extends MockDataTableService {
  async sampleValues(): Promise<number> {
    return 0;
  }
}

let root: string;

async function writeJson(relative: string, value: unknown): Promise<void> {
  const filePath = path.join(root, relative);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(value), "utf8");
}

function valueRow(id: string, name: string) {
  return {
    primaryValues: [{ attributeName: "Id", value: id }],
    attributes: [{ attributeName: "Name", value: name }],
  };
}

beforeAll(async () => {
  root = await mkdtemp(path.join(tmpdir(), "datatables-deploy-"));
  const attributes = {
    attributes: [
      { name: "Id", valueType: "TEXT", primary: true },
      { name: "Name", valueType: "TEXT" },
    ],
  };
  await writeJson("attributes/CustomerTypes.json", attributes);
  await writeJson("attribute_values/CustomerTypes.json", { values: [valueRow("1", "Gold"), valueRow("2", "Silver")] });
  await writeJson("attributes/Invalid.json", attributes);
  await writeJson("attribute_values/Invalid.json", {
    values: [{ primaryValues: [{ attributeName: "Id", value: "1" }], attributes: [{ attributeName: "Color", value: "red" }] }],
  });
  await writeJson("attributes/NoValues.json", attributes);
  await writeJson("attribute_values/Undeclared.json", { values: [valueRow("7", "Bronze")] });
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

function loaded(tables: string[], reconciliation?: DeploymentConfig["reconciliation"]): LoadedDeploymentConfig {
  return {
    root,
    config: {
      instanceARN: "arn:aws:connect:ca-central-1:123456789012:instance/test-instance",
      dataTables: tables.map((name) => ({ name })),
      reconciliation,
    },
  };
}

function createServices(values: MockServiceConfig = {}) {
  const ensureTable = vi.fn(async (spec: TableSpec) => ({
    status: "created" as const,
    table: { id: `id-${spec.name}`, name: spec.name, arn: `arn:${spec.name}` },
  }));
  const ensureAttributes = vi.fn(async () => [{ name: "Name", status: "created" as const }]);
  const listAttributes = vi.fn(async () => [
    { name: "Id", valueType: "TEXT", primary: true },
    { name: "Name", valueType: "TEXT", primary: false },
    { name: "Legacy", valueType: "DATE", primary: false },
  ]);
  const valueService = new MockValueService(values);

  const services: PipelineServices = {
    tables: { ensureTable, findTable: vi.fn(), deleteTable: vi.fn() },
    attributes: { ensureAttributes, listAttributes },
    values: valueService,
  };
  return { services, ensureTable, ensureAttributes, listAttributes, valueService };
}

describe("DeploymentPipeline", () => {
  it("should create a DeploymentPipeline instance", () => {
    expect(createDeploymentPipeline(createServices().services)).toBeInstanceOf(DeploymentPipeline);
  });

  it("should provision the table, its attributes and its values", async () => {
    const { services, ensureTable, ensureAttributes, valueService } = createServices({
      existing: [{ key: JSON.stringify(["1"]), row: valueRow("1", "old") }],
    });

    const report = await new DeploymentPipeline(services).deploy(loaded(["CustomerTypes"]));

    expect(ensureTable).toHaveBeenCalledWith({
      name: "CustomerTypes",
      description: undefined,
      timeZone: "US/Eastern",
      lockLevel: "NONE",
      tags: {},
    });
    expect(ensureAttributes).toHaveBeenCalledWith("id-CustomerTypes", [
      { name: "Id", valueKind: "TEXT", primary: true, description: undefined, validation: undefined },
      { name: "Name", valueKind: "TEXT", primary: false, description: undefined, validation: undefined },
    ]);

    const [result] = report.tables;
    expect(result.status).toBe("created");
    expect(result.tableId).toBe("id-CustomerTypes");
    expect(result.tableArn).toBe("arn:CustomerTypes");
    expect(result.attributes).toEqual([{ name: "Name", status: "created" }]);
    expect(result.values?.status).toBe("reconciled");
    if (result.values?.status !== "reconciled") return;
    expect(result.values.summary.updated).toBe(1);
    expect(result.values.summary.created).toBe(1);
    expect(valueService.stored(JSON.stringify(["1"]))).toEqual({ Name: "Gold" });
    expect(valueService.stored(JSON.stringify(["2"]))).toEqual({ Name: "Silver" });
    expect(report.succeeded).toBe(true);
  });

  it("should keep deploying after a table fails", async () => {
    const { services, ensureTable } = createServices();
    ensureTable.mockRejectedValueOnce(
      new DataTableError("Failed to create data table Broken (AccessDeniedException): denied", "Broken"),
    );

    const report = await new DeploymentPipeline(services).deploy(loaded(["Broken", "CustomerTypes"]));

    expect(report.tables.map((table) => [table.table, table.status])).toEqual([
      ["Broken", "failed"],
      ["CustomerTypes", "created"],
    ]);
    expect(report.tables[0].error).toBe("Failed to create data table Broken (AccessDeniedException): denied");
    expect(report.tablesFailed).toBe(1);
    expect(report.succeeded).toBe(false);
  });

  it("should fail only the table whose values do not match its attributes", async () => {
    const { services } = createServices();

    const report = await new DeploymentPipeline(services).deploy(loaded(["Invalid", "CustomerTypes"]));

    expect(report.tables[0]).toMatchObject({
      table: "Invalid",
      status: "failed",
      tableId: "id-Invalid",
      error: "Invalid values for table Invalid",
      issues: ["row 0: attribute Color is not declared"],
    });
    expect(report.tables[1].status).toBe("created");
  });

  it("should skip values when the table has no values file", async () => {
    const { services } = createServices();

    const report = await new DeploymentPipeline(services).deploy(loaded(["NoValues"]));

    expect(report.tables[0].values).toEqual({ status: "skipped", reason: "no values file" });
    expect(report.succeeded).toBe(true);
  });

  it("should use the table's attributes when none are declared", async () => {
    const { services, ensureAttributes, listAttributes, valueService } = createServices();

    const report = await new DeploymentPipeline(services).deploy(loaded(["Undeclared"]));

    expect(ensureAttributes).not.toHaveBeenCalled();
    expect(listAttributes).toHaveBeenCalledWith("id-Undeclared");
    expect(report.tables[0].attributes).toEqual([]);
    expect(report.tables[0].values?.status).toBe("reconciled");
    expect(valueService.stored(JSON.stringify(["7"]))).toEqual({ Name: "Bronze" });
  });

  it("should count failed rows against the deployment", async () => {
    const { services } = createServices({
      validators: { Name: (value) => (value === "Silver" ? "Value is not allowed" : undefined) },
    });

    const report = await new DeploymentPipeline(services).deploy(loaded(["CustomerTypes"]));

    expect(report.tables[0].status).toBe("created");
    expect(report.rowsFailed).toBe(1);
    expect(report.succeeded).toBe(false);
  });

  it("should let options override the configured reconciliation settings", async () => {
    const { services } = createServices();

    const report = await new DeploymentPipeline(services, { batchSize: 26 }).deploy(
      loaded(["CustomerTypes"], { batchSize: 10 }),
    );

    expect(report.tables[0].status).toBe("failed");
    expect(report.tables[0].error).toContain("26");
  });
});
