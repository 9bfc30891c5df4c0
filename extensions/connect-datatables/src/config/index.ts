export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_TIME_ZONE,
  assertSafeTableName,
  coerceValue,
  loadAttributesConfig,
  loadDeploymentConfig,
  loadValuesConfig,
  resolveRegion,
  resolveWithin,
  toAttributeSpecs,
  toDesiredRows,
  toTableHandle,
  toTableSpec,
} from "./loader.js";
export type { LoadedDeploymentConfig } from "./loader.js";

export {
  AttributeConfigSchema,
  AttributesFileSchema,
  DeploymentConfigSchema,
  LockLevelSchema,
  ReconciliationSettingsSchema,
  RetrySettingsSchema,
  TableConfigSchema,
  ValueKindSchema,
  ValuesFileSchema,
  validateConfig,
} from "./schema.js";
export type {
  AttributeConfig,
  AttributesFile,
  DeploymentConfig,
  RawValue,
  ReconciliationSettings,
  RetrySettings,
  TableConfig,
  ValuesFile,
} from "./schema.js";
