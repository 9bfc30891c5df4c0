/**
 * Post-deployment check of the configured tables
 */

import type { AttributeSummary } from "../attributes/manager.js";
import type { DeploymentConfig } from "../config/schema.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { formatErrorMessage } from "../retry.js";
import type { PipelineServices } from "./services.js";

export const VALUE_SAMPLE_SIZE = 5;

export type TableVerification =
  | {
      table: string;
      status: "found";
      tableId: string;
      attributes: AttributeSummary[];
      primaryKeys: string[];
      /** Stored values seen in a sample of at most VALUE_SAMPLE_SIZE */
      sampledValues: number;
    }
  | { table: string; status: "missing" }
  | { table: string; status: "failed"; error: string };

export async function verifyTables(
  config: DeploymentConfig,
  services: PipelineServices,
  logger: Logger = silentLogger,
): Promise<TableVerification[]> {
  const results: TableVerification[] = [];

  for (const { name } of config.dataTables) {
    try {
      const table = await services.tables.findTable(name);
      if (!table) {
        logger.warn(`Data table ${name} not found`);
        results.push({ table: name, status: "missing" });
        continue;
      }

      const attributes = await services.attributes.listAttributes(table.id);
      const sampledValues = await services.values.sampleValues(table.id, VALUE_SAMPLE_SIZE);
      results.push({
        table: name,
        status: "found",
        tableId: table.id,
        attributes,
        primaryKeys: attributes.filter((attribute) => attribute.primary).map((attribute) => attribute.name),
        sampledValues,
      });
    } catch (error) {
      logger.error(`Verification of ${name} failed: ${formatErrorMessage(error)}`);
      results.push({ table: name, status: "failed", error: formatErrorMessage(error) });
    }
  }

  return results;
}
