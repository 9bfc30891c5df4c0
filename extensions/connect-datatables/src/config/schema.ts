/**
 * JSON Schema definitions for the deployment configuration files
 *
 * - data_tables_config.json: instance, tables and reconciliation settings
 * - attributes/<Table>.json: attribute definitions with validation rules
 * - attribute_values/<Table>.json: desired rows
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { ConfigurationError } from "../errors.js";

// Lock Levels
export const LockLevelSchema = Type.Union([
  Type.Literal("NONE"),
  Type.Literal("DATA_TABLE"),
  Type.Literal("PRIMARY_VALUE"),
  Type.Literal("ATTRIBUTE"),
  Type.Literal("VALUE"),
]);

// Value Types
export const ValueKindSchema = Type.Union([
  Type.Literal("TEXT"),
  Type.Literal("NUMBER"),
  Type.Literal("BOOLEAN"),
  Type.Literal("TEXT_LIST"),
  Type.Literal("NUMBER_LIST"),
]);

export const RetrySettingsSchema = Type.Object({
  maxAttempts: Type.Optional(Type.Integer({ minimum: 1, maximum: 10, description: "Total attempts per batch" })),
  minDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
  maxDelayMs: Type.Optional(Type.Integer({ minimum: 0 })),
  jitter: Type.Optional(Type.Number({ minimum: 0, maximum: 1 })),
  retryTransportErrors: Type.Optional(Type.Boolean()),
});

export const ReconciliationSettingsSchema = Type.Object({
  batchSize: Type.Optional(Type.Integer({ minimum: 1, description: "Rows per batch call" })),
  concurrency: Type.Optional(Type.Integer({ minimum: 1, description: "Batches in flight per phase" })),
  retry: Type.Optional(RetrySettingsSchema),
});

export const TableConfigSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  description: Type.Optional(Type.String()),
  timeZone: Type.Optional(Type.String({ minLength: 1 })),
  valueLockLevel: Type.Optional(LockLevelSchema),
  tags: Type.Optional(Type.Record(Type.String(), Type.String())),
});

export const DeploymentConfigSchema = Type.Object({
  instanceARN: Type.String({ minLength: 1, description: "Amazon Connect instance ARN or ID" }),
  region: Type.Optional(Type.String({ minLength: 1 })),
  dataTables: Type.Array(TableConfigSchema),
  reconciliation: Type.Optional(ReconciliationSettingsSchema),
});

export const ValidationRuleSchema = Type.Object({
  minLength: Type.Optional(Type.Integer({ minimum: 0 })),
  maxLength: Type.Optional(Type.Integer({ minimum: 0 })),
  minValues: Type.Optional(Type.Integer({ minimum: 0 })),
  maxValues: Type.Optional(Type.Integer({ minimum: 0 })),
  ignoreCase: Type.Optional(Type.Boolean()),
  minimum: Type.Optional(Type.Number()),
  maximum: Type.Optional(Type.Number()),
  exclusiveMinimum: Type.Optional(Type.Number()),
  exclusiveMaximum: Type.Optional(Type.Number()),
  multipleOf: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
  enum: Type.Optional(
    Type.Object({
      strict: Type.Optional(Type.Boolean()),
      values: Type.Array(Type.String()),
    }),
  ),
});

export const AttributeConfigSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  valueType: ValueKindSchema,
  primary: Type.Optional(Type.Boolean()),
  description: Type.Optional(Type.String()),
  validation: Type.Optional(ValidationRuleSchema),
});

export const AttributesFileSchema = Type.Object({
  attributes: Type.Array(AttributeConfigSchema),
});

export const RawValueSchema = Type.Union([
  Type.String(),
  Type.Number(),
  Type.Boolean(),
  Type.Array(Type.String()),
  Type.Array(Type.Number()),
]);

export const ValuePairSchema = Type.Object({
  attributeName: Type.String({ minLength: 1 }),
  value: RawValueSchema,
});

export const ValuesFileSchema = Type.Object({
  values: Type.Array(
    Type.Object({
      primaryValues: Type.Array(ValuePairSchema),
      attributes: Type.Array(ValuePairSchema),
    }),
  ),
});

export type RetrySettings = Static<typeof RetrySettingsSchema>;
export type ReconciliationSettings = Static<typeof ReconciliationSettingsSchema>;
export type TableConfig = Static<typeof TableConfigSchema>;
export type DeploymentConfig = Static<typeof DeploymentConfigSchema>;
export type AttributeConfig = Static<typeof AttributeConfigSchema>;
export type AttributesFile = Static<typeof AttributesFileSchema>;
export type RawValue = Static<typeof RawValueSchema>;
export type ValuesFile = Static<typeof ValuesFileSchema>;

/**
 * Check `value` against `schema`, throwing ConfigurationError with every issue
 */
export function validateConfig<T extends TSchema>(schema: T, value: unknown, source: string): Static<T> {
  if (Check(schema, value)) return value;

  const issues: string[] = [];
  for (const error of Errors(schema, value)) {
    const path = error.path || "(root)";
    issues.push(`${path}: ${error.message}`);
  }
  throw new ConfigurationError(
    `Invalid configuration in ${source}`,
    issues.length > 0 ? issues : ["value does not match schema"],
  );
}
