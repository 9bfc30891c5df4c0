/**
 * Remote collaborators of the deploy, verify and cleanup pipelines
 */

import { AttributeManager } from "../attributes/manager.js";
import type { ConnectManagerConfig } from "../client.js";
import { DataTableManager } from "../tables/manager.js";
import type { LockTokenSource, RemoteMutationApi } from "../types.js";
import { ConnectValueManager } from "../values/manager.js";

export type TableProvisioner = Pick<DataTableManager, "ensureTable" | "findTable" | "deleteTable">;

export type AttributeProvisioner = Pick<AttributeManager, "ensureAttributes" | "listAttributes">;

export type ValueService = RemoteMutationApi &
  LockTokenSource & {
    sampleValues(tableId: string, limit?: number): Promise<number>;
  };

export interface PipelineServices {
  tables: TableProvisioner;
  attributes: AttributeProvisioner;
  values: ValueService;
}

export function createPipelineServices(config: ConnectManagerConfig): PipelineServices {
  return {
    tables: new DataTableManager(config),
    attributes: new AttributeManager(config),
    values: new ConnectValueManager(config),
  };
}
