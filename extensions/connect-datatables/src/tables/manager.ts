/**
 * Amazon Connect Data Table Manager - Table lifecycle
 *
 * Lookup by name (paginated), creation with status PUBLISHED, delete and
 * list. Provisioning errors throw DataTableError; deletion reports a
 * result so cleanup can carry on with the other tables.
 */

import {
  CreateDataTableCommand,
  DeleteDataTableCommand,
  ListDataTablesCommand,
  type ConnectClient,
} from "@aws-sdk/client-connect";

import { type ConnectManagerConfig, createConnectClient, pickString } from "../client.js";
import { DataTableError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { extractErrorCode, formatErrorMessage, withConnectRetry } from "../retry.js";
import type { TableSpec } from "../types.js";

// ============================================================================
// Types & Interfaces
// ============================================================================

export interface DataTableSummary {
  id: string;
  name: string;
  arn?: string;
}

export interface EnsureTableResult {
  status: "created" | "existing";
  table: DataTableSummary;
}

export interface DataTableOperationResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// ============================================================================
// Data Table Manager Implementation
// ============================================================================

export class DataTableManager {
  private client: ConnectClient;
  private config: ConnectManagerConfig;
  private logger: Logger;

  constructor(config: ConnectManagerConfig) {
    this.config = config;
    this.logger = config.logger ?? silentLogger;
    this.client = createConnectClient(config);
  }

  /**
   * List every data table of the instance
   */
  async listTables(): Promise<DataTableSummary[]> {
    const tables: DataTableSummary[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const response = await withConnectRetry(
          () =>
            this.client.send(
              new ListDataTablesCommand({
                InstanceId: this.config.instanceArn,
                MaxResults: 100,
                NextToken: nextToken,
              }),
            ),
          { retry: this.config.retry, label: "ListDataTables" },
        );

        for (const summary of response.DataTableSummaryList ?? []) {
          if (!summary.Id || !summary.Name) continue;
          tables.push({ id: summary.Id, name: summary.Name, arn: summary.Arn });
        }
        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw new DataTableError(
        `Failed to list data tables (${extractErrorCode(error) ?? "Unknown"}): ${formatErrorMessage(error)}`,
        "*",
        extractErrorCode(error),
      );
    }

    return tables;
  }

  async findTable(name: string): Promise<DataTableSummary | undefined> {
    const tables = await this.listTables();
    return tables.find((table) => table.name === name);
  }

  async createTable(spec: TableSpec): Promise<DataTableSummary> {
    try {
      const response = await this.client.send(
        new CreateDataTableCommand({
          InstanceId: this.config.instanceArn,
          Name: spec.name,
          Description: spec.description ?? "",
          TimeZone: spec.timeZone,
          ValueLockLevel: spec.lockLevel,
          Status: "PUBLISHED",
          Tags: spec.tags,
        }),
      );

      const id = pickString(response, "Id", "DataTableId");
      if (!id) {
        throw new DataTableError(`Create data table ${spec.name} returned no table ID`, spec.name);
      }
      this.logger.info(`Created data table ${spec.name} (${id})`);
      return { id, name: spec.name, arn: pickString(response, "Arn", "DataTableArn") };
    } catch (error) {
      if (error instanceof DataTableError) throw error;
      const code = extractErrorCode(error) ?? (error instanceof Error ? error.name : undefined);
      throw new DataTableError(
        `Failed to create data table ${spec.name} (${code ?? "Unknown"}): ${formatErrorMessage(error)}`,
        spec.name,
        code,
      );
    }
  }

  /**
   * Find the table by name, creating it when missing
   */
  async ensureTable(spec: TableSpec): Promise<EnsureTableResult> {
    const existing = await this.findTable(spec.name);
    if (existing) {
      this.logger.info(`Data table ${spec.name} already exists (${existing.id})`);
      return { status: "existing", table: existing };
    }
    return { status: "created", table: await this.createTable(spec) };
  }

  async deleteTable(tableId: string): Promise<DataTableOperationResult<void>> {
    try {
      await this.client.send(
        new DeleteDataTableCommand({
          InstanceId: this.config.instanceArn,
          DataTableId: tableId,
        }),
      );
      return { success: true };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

export function createDataTableManager(config: ConnectManagerConfig): DataTableManager {
  return new DataTableManager(config);
}
