/**
 * Row identity and lock scope keys
 */

import type { DesiredRow, LockLevel, TableHandle } from "../types.js";

/**
 * Stable identity of a row built from its primary values in key order
 */
export function primaryKeyId(row: DesiredRow, primaryKey: readonly string[]): string {
  const values = primaryKey.map(
    (name) => row.primaryValues.find((pair) => pair.attributeName === name)?.value ?? null,
  );
  return JSON.stringify(values);
}

/**
 * Scope of the token guarding one attribute value of a row
 */
export function lockScopeForValue(level: LockLevel, rowKey: string, attributeName: string): string | undefined {
  switch (level) {
    case "NONE":
      return undefined;
    case "DATA_TABLE":
      return "*";
    case "PRIMARY_VALUE":
      return rowKey;
    case "ATTRIBUTE":
      return attributeName;
    case "VALUE":
      return `${rowKey}/${attributeName}`;
  }
}

/**
 * Every scope a write of `row` touches, without duplicates
 */
export function lockScopesForRow(table: TableHandle, rowKey: string, row: DesiredRow): string[] {
  const scopes = new Set<string>();
  for (const pair of row.attributes) {
    const scope = lockScopeForValue(table.lockLevel, rowKey, pair.attributeName);
    if (scope !== undefined) scopes.add(scope);
  }
  return [...scopes];
}
