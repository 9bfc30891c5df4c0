import { describe, it, expect, vi } from "vitest";
import { cleanupTables } from "./cleanup.js";
import type { TableProvisioner } from "./services.js";
import type { DeploymentConfig } from "../config/schema.js";

const CONFIG: DeploymentConfig = {
  instanceARN: "arn:aws:connect:ca-central-1:123456789012:instance/test-instance",
  dataTables: [{ name: "CustomerTypes" }, { name: "Missing" }, { name: "Locked" }, { name: "Unlisted" }],
};

describe("cleanupTables", () => {
  it("should delete the tables that exist and report the rest", async () => {
    const findTable = vi.fn(async (name: string) => {
      if (name === "Missing") return undefined;
      if (name === "Unlisted") throw new Error("Failed to list data tables (ThrottlingException): Rate exceeded");
      return { id: `id-${name}`, name };
    });
    const deleteTable = vi.fn(async (tableId: string) =>
      tableId === "id-Locked" ? { success: false, error: "Table is in use" } : { success: true },
    );
    const tables: TableProvisioner = { findTable, deleteTable, ensureTable: vi.fn() };

    const results = await cleanupTables(CONFIG, tables);

    expect(results).toEqual([
      { table: "CustomerTypes", status: "deleted", tableId: "id-CustomerTypes" },
      { table: "Missing", status: "not_found" },
      { table: "Locked", status: "failed", error: "Table is in use" },
      {
        table: "Unlisted",
        status: "failed",
        error: "Failed to list data tables (ThrottlingException): Rate exceeded",
      },
    ]);
    expect(deleteTable).toHaveBeenCalledTimes(2);
  });
});
