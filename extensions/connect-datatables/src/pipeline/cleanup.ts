/**
 * Deletes the configured tables, one result per table
 */

import type { DeploymentConfig } from "../config/schema.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { formatErrorMessage } from "../retry.js";
import type { TableProvisioner } from "./services.js";

export type TableCleanupResult =
  | { table: string; status: "deleted"; tableId: string }
  | { table: string; status: "not_found" }
  | { table: string; status: "failed"; error: string };

export async function cleanupTables(
  config: DeploymentConfig,
  tables: TableProvisioner,
  logger: Logger = silentLogger,
): Promise<TableCleanupResult[]> {
  const results: TableCleanupResult[] = [];

  for (const { name } of config.dataTables) {
    let tableId: string;
    try {
      const table = await tables.findTable(name);
      if (!table) {
        results.push({ table: name, status: "not_found" });
        continue;
      }
      tableId = table.id;
    } catch (error) {
      results.push({ table: name, status: "failed", error: formatErrorMessage(error) });
      continue;
    }

    const deleted = await tables.deleteTable(tableId);
    if (deleted.success) {
      logger.info(`Deleted data table ${name} (${tableId})`);
      results.push({ table: name, status: "deleted", tableId });
    } else {
      logger.warn(`Failed to delete data table ${name}: ${deleted.error ?? "unknown error"}`);
      results.push({ table: name, status: "failed", error: deleted.error ?? "unknown error" });
    }
  }

  return results;
}
