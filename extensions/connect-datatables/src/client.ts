/**
 * Amazon Connect client configuration shared by the managers
 */

import { ConnectClient } from "@aws-sdk/client-connect";
import type { Logger } from "./logger.js";
import type { RetryConfig } from "./retry.js";

export const DEFAULT_REGION = "ca-central-1";

export interface ConnectManagerConfig {
  /** Instance ARN or ID passed as InstanceId */
  instanceArn: string;
  region?: string;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  /** SDK-level attempts per request */
  maxRetries?: number;
  /** Retry policy for idempotent list calls */
  retry?: RetryConfig;
  logger?: Logger;
}

export function createConnectClient(config: ConnectManagerConfig): ConnectClient {
  return new ConnectClient({
    region: config.region ?? DEFAULT_REGION,
    credentials: config.credentials,
    maxAttempts: config.maxRetries ?? 3,
  });
}

/**
 * First string field present on a response, for members whose name varies
 */
export function pickString(source: object, ...keys: string[]): string | undefined {
  for (const key of keys) {
    if (!(key in source)) continue;
    const value: unknown = Reflect.get(source, key);
    if (typeof value === "string" && value.length > 0) return value;
  }
  return undefined;
}
