/**
 * Configuration loading for the data table deployment
 *
 * The deployment file sits in a config directory next to two per-table
 * directories:
 *
 *   config/data_tables_config.json
 *   config/attributes/<Table>.json
 *   config/attribute_values/<Table>.json
 *
 * A missing per-table file means the step is skipped for that table.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";

import { DEFAULT_REGION } from "../client.js";
import { ConfigurationError } from "../errors.js";
import type {
  AttributeSpec,
  AttributeValue,
  DesiredRow,
  TableHandle,
  TableSpec,
  ValueKind,
  ValuePair,
} from "../types.js";
import {
  AttributesFileSchema,
  DeploymentConfigSchema,
  ValuesFileSchema,
  validateConfig,
  type AttributesFile,
  type DeploymentConfig,
  type RawValue,
  type TableConfig,
  type ValuesFile,
} from "./schema.js";

export const DEFAULT_CONFIG_PATH = "config/data_tables_config.json";
export const DEFAULT_TIME_ZONE = "US/Eastern";

// ============================================================================
// Paths
// ============================================================================

export function assertSafeTableName(name: string): void {
  if (name.includes("..") || name.includes("/") || name.includes("\\")) {
    throw new ConfigurationError(`Invalid table name: ${name}`);
  }
}

/**
 * Resolve `relative` under `root`, rejecting paths that leave it
 */
export function resolveWithin(root: string, relative: string): string {
  const base = path.resolve(root);
  const resolved = path.resolve(base, relative);
  const offset = path.relative(base, resolved);
  if (offset.startsWith("..") || path.isAbsolute(offset)) {
    throw new ConfigurationError(`Invalid config file path: ${relative}`);
  }
  return resolved;
}

async function readJson(filePath: string): Promise<unknown | undefined> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
    throw new ConfigurationError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

// ============================================================================
// Loaders
// ============================================================================

export interface LoadedDeploymentConfig {
  config: DeploymentConfig;
  /** Directory holding the per-table attribute and value files */
  root: string;
}

export async function loadDeploymentConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<LoadedDeploymentConfig> {
  const filePath = path.resolve(configPath);
  const raw = await readJson(filePath);
  if (raw === undefined) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }

  const config = validateConfig(DeploymentConfigSchema, raw, configPath);
  const seen = new Set<string>();
  const issues: string[] = [];
  for (const table of config.dataTables) {
    assertSafeTableName(table.name);
    if (seen.has(table.name)) issues.push(`dataTables: table ${table.name} declared more than once`);
    seen.add(table.name);
  }
  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid configuration in ${configPath}`, issues);
  }

  return { config, root: path.dirname(filePath) };
}

export async function loadAttributesConfig(root: string, tableName: string): Promise<AttributesFile | undefined> {
  assertSafeTableName(tableName);
  const relative = path.join("attributes", `${tableName}.json`);
  const raw = await readJson(resolveWithin(root, relative));
  return raw === undefined ? undefined : validateConfig(AttributesFileSchema, raw, relative);
}

export async function loadValuesConfig(root: string, tableName: string): Promise<ValuesFile | undefined> {
  assertSafeTableName(tableName);
  const relative = path.join("attribute_values", `${tableName}.json`);
  const raw = await readJson(resolveWithin(root, relative));
  return raw === undefined ? undefined : validateConfig(ValuesFileSchema, raw, relative);
}

/**
 * --region flag, then the config file, then AWS_REGION, then the default
 */
export function resolveRegion(
  flag: string | undefined,
  config: DeploymentConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return flag || config.region || env.AWS_REGION || DEFAULT_REGION;
}

// ============================================================================
// Conversion
// ============================================================================

export function toTableSpec(table: TableConfig): TableSpec {
  return {
    name: table.name,
    description: table.description,
    timeZone: table.timeZone ?? DEFAULT_TIME_ZONE,
    lockLevel: table.valueLockLevel ?? "NONE",
    tags: table.tags ?? {},
  };
}

export function toAttributeSpecs(file: AttributesFile): AttributeSpec[] {
  return file.attributes.map((attribute) => ({
    name: attribute.name,
    valueKind: attribute.valueType,
    primary: attribute.primary ?? false,
    description: attribute.description,
    validation: attribute.validation,
  }));
}

export function toTableHandle(
  table: { id: string; name: string },
  spec: TableSpec,
  attributes: readonly AttributeSpec[],
): TableHandle {
  return {
    id: table.id,
    name: table.name,
    lockLevel: spec.lockLevel,
    primaryKey: attributes.filter((attribute) => attribute.primary).map((attribute) => attribute.name),
  };
}

/**
 * Coerce a configured value to the declared kind; undefined when it cannot be
 */
export function coerceValue(kind: ValueKind, raw: RawValue): AttributeValue | undefined {
  switch (kind) {
    case "TEXT":
      return Array.isArray(raw) ? undefined : String(raw);
    case "NUMBER": {
      if (typeof raw === "number") return raw;
      if (typeof raw !== "string" || raw.trim() === "") return undefined;
      const parsed = Number(raw.trim());
      return Number.isFinite(parsed) ? parsed : undefined;
    }
    case "BOOLEAN": {
      if (typeof raw === "boolean") return raw;
      if (typeof raw !== "string") return undefined;
      const normalized = raw.trim().toLowerCase();
      if (normalized === "true") return true;
      if (normalized === "false") return false;
      return undefined;
    }
    case "TEXT_LIST": {
      if (typeof raw === "string") return raw.split(",");
      if (!Array.isArray(raw)) return undefined;
      const texts: string[] = [];
      for (const item of raw) texts.push(String(item));
      return texts;
    }
    case "NUMBER_LIST": {
      const items = typeof raw === "string" ? raw.split(",").map((item) => item.trim()) : raw;
      if (!Array.isArray(items)) return undefined;
      const numbers: number[] = [];
      for (const item of items) {
        const parsed = typeof item === "number" ? item : item === "" ? Number.NaN : Number(item);
        if (!Number.isFinite(parsed)) return undefined;
        numbers.push(parsed);
      }
      return numbers;
    }
  }
}

/**
 * Build typed desired rows from the values file
 */
export function toDesiredRows(tableName: string, values: ValuesFile, attributes: readonly AttributeSpec[]): DesiredRow[] {
  const kinds = new Map(attributes.map((attribute): [string, ValueKind] => [attribute.name, attribute.valueKind]));
  const issues: string[] = [];

  const convert = (pairs: ReadonlyArray<{ attributeName: string; value: RawValue }>, where: string): ValuePair[] =>
    pairs.flatMap((pair) => {
      const kind = kinds.get(pair.attributeName);
      if (!kind) {
        issues.push(`${where}: attribute ${pair.attributeName} is not declared`);
        return [];
      }
      const value = coerceValue(kind, pair.value);
      if (value === undefined) {
        issues.push(`${where}: cannot convert ${JSON.stringify(pair.value)} for ${pair.attributeName} (${kind})`);
        return [];
      }
      return [{ attributeName: pair.attributeName, value }];
    });

  const rows = values.values.map((entry, index) => ({
    primaryValues: convert(entry.primaryValues, `row ${index}`),
    attributes: convert(entry.attributes, `row ${index}`),
  }));

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid values for table ${tableName}`, issues);
  }
  return rows;
}
