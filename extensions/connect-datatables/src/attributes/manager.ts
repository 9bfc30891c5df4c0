/**
 * Amazon Connect Data Table Attribute Manager
 *
 * Creates the attributes declared for a table, skipping the ones already
 * present, and maps validation rules onto the API's PascalCase members.
 */

import {
  CreateDataTableAttributeCommand,
  ListDataTableAttributesCommand,
  type ConnectClient,
} from "@aws-sdk/client-connect";

import { type ConnectManagerConfig, createConnectClient, pickString } from "../client.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { formatErrorMessage, withConnectRetry } from "../retry.js";
import type { AttributeSpec, ValidationRule } from "../types.js";

// ============================================================================
// Types & Interfaces
// ============================================================================

export interface AttributeSummary {
  name: string;
  valueType?: string;
  primary: boolean;
}

export type AttributeResult =
  | { name: string; status: "created"; attributeArn?: string }
  | { name: string; status: "skipped"; message: string }
  | { name: string; status: "failed"; error: string };

export interface ApiValidation {
  MinLength?: number;
  MaxLength?: number;
  MinValues?: number;
  MaxValues?: number;
  IgnoreCase?: boolean;
  Minimum?: number;
  Maximum?: number;
  ExclusiveMinimum?: number;
  ExclusiveMaximum?: number;
  MultipleOf?: number;
  Enum?: {
    Strict: boolean;
    Values: string[];
  };
}

/**
 * Convert a validation rule to the API's member names
 */
export function formatValidation(rule: ValidationRule): ApiValidation {
  const validation: ApiValidation = {};
  if (rule.minLength !== undefined) validation.MinLength = rule.minLength;
  if (rule.maxLength !== undefined) validation.MaxLength = rule.maxLength;
  if (rule.minValues !== undefined) validation.MinValues = rule.minValues;
  if (rule.maxValues !== undefined) validation.MaxValues = rule.maxValues;
  if (rule.ignoreCase !== undefined) validation.IgnoreCase = rule.ignoreCase;
  if (rule.minimum !== undefined) validation.Minimum = rule.minimum;
  if (rule.maximum !== undefined) validation.Maximum = rule.maximum;
  if (rule.exclusiveMinimum !== undefined) validation.ExclusiveMinimum = rule.exclusiveMinimum;
  if (rule.exclusiveMaximum !== undefined) validation.ExclusiveMaximum = rule.exclusiveMaximum;
  if (rule.multipleOf !== undefined) validation.MultipleOf = rule.multipleOf;
  if (rule.enum) {
    validation.Enum = { Strict: rule.enum.strict ?? true, Values: rule.enum.values };
  }
  return validation;
}

// ============================================================================
// Attribute Manager Implementation
// ============================================================================

export class AttributeManager {
  private client: ConnectClient;
  private config: ConnectManagerConfig;
  private logger: Logger;

  constructor(config: ConnectManagerConfig) {
    this.config = config;
    this.logger = config.logger ?? silentLogger;
    this.client = createConnectClient(config);
  }

  async listAttributes(tableId: string): Promise<AttributeSummary[]> {
    const attributes: AttributeSummary[] = [];
    let nextToken: string | undefined;

    do {
      const response = await withConnectRetry(
        () =>
          this.client.send(
            new ListDataTableAttributesCommand({
              InstanceId: this.config.instanceArn,
              DataTableId: tableId,
              MaxResults: 100,
              NextToken: nextToken,
            }),
          ),
        { retry: this.config.retry, label: "ListDataTableAttributes" },
      );

      for (const attribute of response.Attributes ?? []) {
        if (!attribute.Name) continue;
        attributes.push({
          name: attribute.Name,
          valueType: attribute.ValueType,
          primary: attribute.Primary ?? false,
        });
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return attributes;
  }

  /**
   * Create every declared attribute the table does not have yet
   */
  async ensureAttributes(tableId: string, specs: readonly AttributeSpec[]): Promise<AttributeResult[]> {
    const existing = new Set((await this.listAttributes(tableId)).map((attribute) => attribute.name));
    const results: AttributeResult[] = [];

    for (const spec of specs) {
      if (existing.has(spec.name)) {
        results.push({ name: spec.name, status: "skipped", message: "Attribute already exists" });
        continue;
      }
      results.push(await this.createAttribute(tableId, spec));
    }

    const created = results.filter((result) => result.status === "created").length;
    this.logger.info(`Attributes: ${created} created, ${results.length - created} skipped or failed`);
    return results;
  }

  async createAttribute(tableId: string, spec: AttributeSpec): Promise<AttributeResult> {
    try {
      const response = await this.client.send(
        new CreateDataTableAttributeCommand({
          InstanceId: this.config.instanceArn,
          DataTableId: tableId,
          Name: spec.name,
          ValueType: spec.valueKind,
          Description: spec.description ?? "",
          Primary: spec.primary,
          ...(spec.validation ? { Validation: formatValidation(spec.validation) } : {}),
        }),
      );
      return {
        name: spec.name,
        status: "created",
        attributeArn: pickString(response, "AttributeArn", "Arn"),
      };
    } catch (error) {
      this.logger.warn(`Failed to create attribute ${spec.name}: ${formatErrorMessage(error)}`);
      return { name: spec.name, status: "failed", error: formatErrorMessage(error) };
    }
  }
}

export function createAttributeManager(config: ConnectManagerConfig): AttributeManager {
  return new AttributeManager(config);
}
