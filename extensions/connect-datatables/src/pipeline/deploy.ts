/**
 * Deployment Pipeline
 *
 * For every configured table: find or create the table, create the missing
 * attributes, then reconcile the desired values (update first, create the
 * rows the service does not have). A failing table is reported and the
 * remaining tables still deploy.
 */

import type { AttributeResult } from "../attributes/manager.js";
import {
  loadAttributesConfig,
  loadValuesConfig,
  toAttributeSpecs,
  toDesiredRows,
  toTableHandle,
  toTableSpec,
  type LoadedDeploymentConfig,
} from "../config/loader.js";
import type { ReconciliationSettings, TableConfig } from "../config/schema.js";
import { ConfigurationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { ConflictRetryConfig } from "../reconciliation/conflict-retry.js";
import { Reconciler } from "../reconciliation/engine.js";
import { formatErrorMessage } from "../retry.js";
import {
  VALUE_KINDS,
  type AttributeSpec,
  type ReconciliationSummary,
  type ValueKind,
} from "../types.js";
import type { PipelineServices } from "./services.js";

// ============================================================================
// Types
// ============================================================================

export interface DeployOptions {
  /** Overrides `reconciliation.batchSize` */
  batchSize?: number;
  /** Overrides `reconciliation.retry.maxAttempts` */
  maxAttempts?: number;
  /** Overrides `reconciliation.concurrency` */
  concurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export type ValuesOutcome =
  | { status: "reconciled"; summary: ReconciliationSummary }
  | { status: "skipped"; reason: string };

export interface TableDeploymentResult {
  table: string;
  status: "created" | "existing" | "failed";
  tableId?: string;
  tableArn?: string;
  attributes: AttributeResult[];
  values?: ValuesOutcome;
  error?: string;
  /** Configuration problems behind `error` */
  issues?: string[];
}

export interface DeploymentReport {
  tables: TableDeploymentResult[];
  tablesFailed: number;
  rowsFailed: number;
  succeeded: boolean;
  durationMs: number;
}

// ============================================================================
// Pipeline
// ============================================================================

export class DeploymentPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly services: PipelineServices,
    private readonly options: DeployOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async deploy(loaded: LoadedDeploymentConfig): Promise<DeploymentReport> {
    const startedAt = Date.now();
    const results: TableDeploymentResult[] = [];

    for (const table of loaded.config.dataTables) {
      results.push(await this.deployTable(loaded.root, table, loaded.config.reconciliation));
    }

    const tablesFailed = results.filter((result) => result.status === "failed").length;
    const rowsFailed = results.reduce(
      (sum, result) => sum + (result.values?.status === "reconciled" ? result.values.summary.failed : 0),
      0,
    );

    this.logger.info(`Deployment finished: ${results.length - tablesFailed}/${results.length} table(s) deployed`);
    return {
      tables: results,
      tablesFailed,
      rowsFailed,
      succeeded: tablesFailed === 0 && rowsFailed === 0,
      durationMs: Date.now() - startedAt,
    };
  }

  private async deployTable(
    root: string,
    tableConfig: TableConfig,
    settings: ReconciliationSettings | undefined,
  ): Promise<TableDeploymentResult> {
    const result: TableDeploymentResult = { table: tableConfig.name, status: "failed", attributes: [] };
    const spec = toTableSpec(tableConfig);

    try {
      const ensured = await this.services.tables.ensureTable(spec);
      result.status = ensured.status;
      result.tableId = ensured.table.id;
      result.tableArn = ensured.table.arn;

      const attributeSpecs = await this.resolveAttributes(root, spec.name, ensured.table.id, result);

      const valuesFile = await loadValuesConfig(root, spec.name);
      if (!valuesFile) {
        this.logger.info(`No values file for ${spec.name}, skipping values`);
        result.values = { status: "skipped", reason: "no values file" };
        return result;
      }

      const rows = toDesiredRows(spec.name, valuesFile, attributeSpecs);
      const reconciler = new Reconciler(this.services.values, this.services.values, {
        batchSize: this.options.batchSize ?? settings?.batchSize,
        concurrency: this.options.concurrency ?? settings?.concurrency,
        retry: this.retrySettings(settings),
        logger: this.logger,
        signal: this.options.signal,
      });
      const summary = await reconciler.reconcile(toTableHandle(ensured.table, spec, attributeSpecs), rows);
      result.values = { status: "reconciled", summary };
      return result;
    } catch (error) {
      result.status = "failed";
      result.error = formatErrorMessage(error);
      if (error instanceof ConfigurationError && error.issues.length > 0) {
        result.issues = error.issues;
      }
      this.logger.error(`Deployment of ${spec.name} failed: ${result.error}`);
      for (const issue of result.issues ?? []) this.logger.error(`  ${issue}`);
      return result;
    }
  }

  /**
   * Declared attributes, created where missing; the table's own attributes when none are declared
   */
  private async resolveAttributes(
    root: string,
    tableName: string,
    tableId: string,
    result: TableDeploymentResult,
  ): Promise<AttributeSpec[]> {
    const attributesFile = await loadAttributesConfig(root, tableName);
    if (attributesFile) {
      const specs = toAttributeSpecs(attributesFile);
      result.attributes = await this.services.attributes.ensureAttributes(tableId, specs);
      return specs;
    }

    this.logger.info(`No attributes file for ${tableName}, using the attributes already defined`);
    const existing = await this.services.attributes.listAttributes(tableId);
    return existing.flatMap((attribute): AttributeSpec[] =>
      isValueKind(attribute.valueType)
        ? [{ name: attribute.name, valueKind: attribute.valueType, primary: attribute.primary }]
        : [],
    );
  }

  private retrySettings(settings: ReconciliationSettings | undefined): Partial<ConflictRetryConfig> {
    const retry: Partial<ConflictRetryConfig> = { ...settings?.retry };
    if (this.options.maxAttempts !== undefined) retry.maxAttempts = this.options.maxAttempts;
    return retry;
  }
}

export function createDeploymentPipeline(services: PipelineServices, options?: DeployOptions): DeploymentPipeline {
  return new DeploymentPipeline(services, options);
}

function isValueKind(value: string | undefined): value is ValueKind {
  return VALUE_KINDS.some((kind) => kind === value);
}
