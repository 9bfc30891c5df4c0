import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";

import type { Logger, PipelineServices, TableSpec } from "../../extensions/connect-datatables/src/index.js";
import { MockDataTableService } from "../../extensions/connect-datatables/src/reconciliation/mock-remote.js";
import type { RuntimeEnv } from "../runtime.js";
import { deployCommand, formatTableResult } from "./deploy.js";

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

beforeAll(async () => {
  root = await mkdtemp(path.join(tmpdir(), "datatables-cli-"));
  await writeJson("config/data_tables_config.json", {
    instanceARN: "arn:aws:connect:ca-central-1:123456789012:instance/test-instance",
    region: "us-west-2",
    dataTables: [{ name: "CustomerTypes" }],
  });
  await writeJson("config/attributes/CustomerTypes.json", {
    attributes: [
      { name: "Id", valueType: "TEXT", primary: true },
      { name: "Tier", valueType: "TEXT" },
    ],
  });
  await writeJson("config/attribute_values/CustomerTypes.json", {
    values: [
      { primaryValues: [{ attributeName: "Id", value: "1" }], attributes: [{ attributeName: "Tier", value: "Gold" }] },
      { primaryValues: [{ attributeName: "Id", value: "2" }], attributes: [{ attributeName: "Tier", value: "Tin" }] },
    ],
  });
});

afterAll(async () => {
  await rm(root, { recursive: true, force: true });
});

function createRuntime() {
  const lines: string[] = [];
  const runtime: RuntimeEnv = {
    log: (...args) => lines.push(args.map(String).join(" ")),
    error: vi.fn(),
    exit: vi.fn(),
  };
  return { runtime, lines };
}

function createMockLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createServices(values: MockValueService): PipelineServices {
  return {
    tables: {
      ensureTable: vi.fn(async (spec: TableSpec) => ({ status: "existing" as const, table: { id: "tbl-1", name: spec.name } })),
      findTable: vi.fn(),
      deleteTable: vi.fn(),
    },
    attributes: {
      ensureAttributes: vi.fn(async () => [
        { name: "Id", status: "skipped" as const, message: "Attribute already exists" },
        { name: "Tier", status: "failed" as const, error: "Invalid value type" },
      ]),
      listAttributes: vi.fn(),
    },
    values,
  };
}

describe("deployCommand", () => {
  it("should print one block per table and exit 1 when a row failed", async () => {
    const { runtime, lines } = createRuntime();
    const values = new MockValueService({
      existing: [{ key: JSON.stringify(["1"]), row: { primaryValues: [], attributes: [{ attributeName: "Tier", value: "Silver" }] } }],
      validators: { Tier: (value) => (value === "Tin" ? "Value not in enum" : undefined) },
    });
    const createServicesSpy = vi.fn(() => createServices(values));

    await deployCommand(
      { config: path.join(root, "config/data_tables_config.json") },
      runtime,
      { createServices: createServicesSpy, logger: createMockLogger() },
    );

    expect(createServicesSpy).toHaveBeenCalledWith(
      expect.objectContaining({
        instanceArn: "arn:aws:connect:ca-central-1:123456789012:instance/test-instance",
        region: "us-west-2",
      }),
    );
    expect(lines).toEqual([
      "Deployment Results:",
      "=".repeat(50),
      "[SKIP] CustomerTypes: existing",
      "  - Data table already exists",
      "  - Attributes: 0 created, 1 skipped, 1 failed",
      "    Tier: Invalid value type",
      "  - Values: 1 updated, 0 created, 1 failed, 2 total",
      "    row 1 (Id=2) failed in update phase: validation error: Value not in enum",
    ]);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });

  it("should print the report as JSON", async () => {
    const { runtime, lines } = createRuntime();
    const values = new MockValueService();

    const report = await deployCommand(
      { config: path.join(root, "config/data_tables_config.json"), json: true, region: "eu-west-1" },
      runtime,
      { createServices: () => createServices(values), logger: createMockLogger() },
    );

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual(JSON.parse(JSON.stringify(report)));
    expect(report.tables[0].values?.status).toBe("reconciled");
  });
});

describe("deployCommand cancellation", () => {
  it("should report rows not yet sent as cancelled and still print the results", async () => {
    const { runtime, lines } = createRuntime();
    const values = new MockValueService();
    const controller = new AbortController();
    controller.abort();
    const listeners = process.listenerCount("SIGINT");

    const report = await deployCommand(
      { config: path.join(root, "config/data_tables_config.json") },
      runtime,
      { createServices: () => createServices(values), logger: createMockLogger(), signal: controller.signal },
    );

    expect(lines.slice(6)).toEqual([
      "  - Values: 0 updated, 0 created, 2 failed, 2 total",
      "    row 0 (Id=1) failed in update phase: reconciliation cancelled before batch was sent",
      "    row 1 (Id=2) failed in update phase: reconciliation cancelled before batch was sent",
    ]);
    expect(report.rowsFailed).toBe(2);
    expect(values.calls).toHaveLength(0);
    expect(runtime.exit).toHaveBeenCalledWith(1);
    expect(process.listenerCount("SIGINT")).toBe(listeners);
  });
});

describe("formatTableResult", () => {
  it("should list configuration issues under a failed table", () => {
    expect(
      formatTableResult({
        table: "Broken",
        status: "failed",
        attributes: [],
        error: "Invalid values for table Broken",
        issues: ["row 0: attribute Color is not declared"],
      }),
    ).toEqual([
      "[FAIL] Broken: failed",
      "  - Error: Invalid values for table Broken",
      "    row 0: attribute Color is not declared",
    ]);
  });

  it("should mark created tables OK and skipped values", () => {
    expect(
      formatTableResult({
        table: "New",
        status: "created",
        attributes: [{ name: "Id", status: "created" }],
        values: { status: "skipped", reason: "no values file" },
      }),
    ).toEqual(["[OK] New: created", "  - Attributes: 1 created, 0 skipped, 0 failed", "  - Values: skipped (no values file)"]);
  });
});
