import { describe, it, expect, vi } from "vitest";
import {
  ConflictRetryManager,
  RETRIES_EXHAUSTED_MESSAGE,
  resolveConflictRetryConfig,
  CONFLICT_RETRY_DEFAULTS,
  type ConflictRetryConfig,
} from "./conflict-retry.js";
import { LockVersionCache } from "./lock-cache.js";
import { MockDataTableService, type MockServiceConfig } from "./mock-remote.js";
import type { DesiredRow, LockLevel, RemoteMutationApi, RowMutation, RowResult, TableHandle } from "../types.js";

const FAST = { minDelayMs: 0, maxDelayMs: 0, jitter: 0 };

function makeTable(lockLevel: LockLevel): TableHandle {
  return { id: "tbl-1", name: "CustomerTypes", lockLevel, primaryKey: ["Id"] };
}

function makeRow(id: string, name: string): DesiredRow {
  return {
    primaryValues: [{ attributeName: "Id", value: id }],
    attributes: [{ attributeName: "Name", value: name }],
  };
}

function mutation(id: string, name = `name-${id}`): RowMutation {
  return { key: JSON.stringify([id]), row: makeRow(id, name) };
}

function setup(config: MockServiceConfig, retry: Partial<ConflictRetryConfig> = {}) {
  const service = new MockDataTableService(config);
  const cache = new LockVersionCache(service);
  const manager = new ConflictRetryManager(service, cache, { retry: { ...FAST, ...retry } });
  return { service, cache, manager };
}

describe("resolveConflictRetryConfig", () => {
  it("should fall back to defaults", () => {
    expect(resolveConflictRetryConfig()).toEqual(CONFLICT_RETRY_DEFAULTS);
  });

  it("should clamp out-of-range values", () => {
    expect(resolveConflictRetryConfig({ maxAttempts: 0, minDelayMs: 50, maxDelayMs: 10, jitter: 3 })).toEqual({
      maxAttempts: 1,
      minDelayMs: 50,
      maxDelayMs: 50,
      jitter: 1,
      retryTransportErrors: false,
    });
  });
});

describe("ConflictRetryManager", () => {
  const existing = [{ key: JSON.stringify(["1"]), row: makeRow("1", "old") }];

  it("should succeed when conflicts stop before the retry bound", async () => {
    const { service, manager } = setup(
      { existing, conflicts: { [JSON.stringify(["1"])]: 2 } },
      { maxAttempts: 3 },
    );

    const execution = await manager.execute("update", makeTable("PRIMARY_VALUE"), [mutation("1", "new")]);

    expect(execution.results.get(JSON.stringify(["1"]))).toEqual({ key: JSON.stringify(["1"]), status: "success" });
    expect(execution.attempts).toBe(3);
    expect(execution.retries).toBe(2);
    // Every conflict forces a fresh token before the next attempt
    expect(service.tokenFetches).toHaveLength(3);
    expect(service.stored(JSON.stringify(["1"]))).toEqual({ Name: "new" });
  });

  it("should fail with retries exhausted when conflicts reach the bound", async () => {
    const { service, manager } = setup(
      { existing, conflicts: { [JSON.stringify(["1"])]: 3 } },
      { maxAttempts: 3 },
    );

    const execution = await manager.execute("update", makeTable("PRIMARY_VALUE"), [mutation("1")]);

    expect(execution.results.get(JSON.stringify(["1"]))).toEqual({
      key: JSON.stringify(["1"]),
      status: "failed",
      reason: "conflict-exhausted",
      message: RETRIES_EXHAUSTED_MESSAGE,
    });
    expect(service.calls).toHaveLength(3);
  });

  it("should only resend the rows that conflicted", async () => {
    const { service, manager } = setup({
      existing: [...existing, { key: JSON.stringify(["2"]), row: makeRow("2", "old") }],
      conflicts: { [JSON.stringify(["2"])]: 1 },
    });

    const execution = await manager.execute("update", makeTable("PRIMARY_VALUE"), [mutation("1"), mutation("2")]);

    expect(service.calls.map((call) => call.keys)).toEqual([
      [JSON.stringify(["1"]), JSON.stringify(["2"])],
      [JSON.stringify(["2"])],
    ]);
    expect([...execution.results.values()].map((result) => result.status)).toEqual(["success", "success"]);
  });

  it("should never retry validation errors", async () => {
    const { service, manager } = setup({
      existing,
      validators: { Name: (value) => (value === "bad" ? "Name failed validation" : undefined) },
    });

    const execution = await manager.execute("update", makeTable("NONE"), [mutation("1", "bad")]);

    expect(execution.results.get(JSON.stringify(["1"]))).toEqual({
      key: JSON.stringify(["1"]),
      status: "failed",
      reason: "validation",
      message: "validation error: Name failed validation",
    });
    expect(service.calls).toHaveLength(1);
    expect(execution.retries).toBe(0);
  });

  it("should pass not-found rows through without retrying", async () => {
    const { service, manager } = setup({});

    const execution = await manager.execute("update", makeTable("NONE"), [mutation("9")]);

    expect(execution.results.get(JSON.stringify(["9"]))).toEqual({
      key: JSON.stringify(["9"]),
      status: "not-found",
      message: "Value not found",
    });
    expect(service.calls).toHaveLength(1);
  });

  it("should retry the whole batch when the call throws a conflict", async () => {
    const conflict = Object.assign(new Error("Lock version mismatch"), { name: "ConflictException" });
    const { service, manager } = setup({ existing, thrown: [{ operation: "update", error: conflict }] });

    const execution = await manager.execute("update", makeTable("DATA_TABLE"), [mutation("1")]);

    expect(execution.results.get(JSON.stringify(["1"]))?.status).toBe("success");
    expect(service.calls).toHaveLength(2);
  });

  it("should report transport errors without retrying by default", async () => {
    const timeout = Object.assign(new Error("Request timed out"), { name: "TimeoutError" });
    const { service, manager } = setup({ existing, thrown: [{ operation: "update", error: timeout }] });

    const execution = await manager.execute("update", makeTable("NONE"), [mutation("1")]);

    expect(execution.results.get(JSON.stringify(["1"]))).toEqual({
      key: JSON.stringify(["1"]),
      status: "failed",
      reason: "transport",
      message: "batch update failed: Request timed out",
    });
    expect(service.calls).toHaveLength(1);
  });

  it("should fold transport errors into the retry budget when configured", async () => {
    const timeout = Object.assign(new Error("Request timed out"), { name: "TimeoutError" });
    const { service, manager } = setup(
      { existing, thrown: [{ operation: "update", error: timeout }] },
      { retryTransportErrors: true },
    );

    const execution = await manager.execute("update", makeTable("NONE"), [mutation("1")]);

    expect(execution.results.get(JSON.stringify(["1"]))?.status).toBe("success");
    expect(service.calls).toHaveLength(2);
  });

  it("should report exhausted transport retries as transport failures", async () => {
    const timeout = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    const { manager } = setup(
      {
        existing,
        thrown: [
          { operation: "update", error: timeout },
          { operation: "update", error: timeout },
        ],
      },
      { retryTransportErrors: true, maxAttempts: 2 },
    );

    const execution = await manager.execute("update", makeTable("NONE"), [mutation("1")]);

    expect(execution.results.get(JSON.stringify(["1"]))).toEqual({
      key: JSON.stringify(["1"]),
      status: "failed",
      reason: "transport",
      message: "transport error, retries exhausted: socket hang up",
    });
  });

  it("should fail the batch when the lock version cannot be fetched", async () => {
    const { service, manager } = setup({ existing, thrown: [{ operation: "fetch", error: new Error("AccessDenied") }] });

    const execution = await manager.execute("update", makeTable("DATA_TABLE"), [mutation("1")]);

    expect(execution.results.get(JSON.stringify(["1"]))).toEqual({
      key: JSON.stringify(["1"]),
      status: "failed",
      reason: "remote",
      message: "lock version fetch failed: AccessDenied",
    });
    expect(service.calls).toHaveLength(0);
  });

  describe("calls interrupted after some rows were sent", () => {
    function interruptedApi(error: unknown) {
      const batchCreate = vi.fn(
        async (_table: TableHandle, mutations: readonly RowMutation[]): Promise<RowResult[]> =>
          mutations.map((m, index): RowResult =>
            index === 0 ? { key: m.key, status: "success" } : { key: m.key, status: "error", error },
          ),
      );
      const api: RemoteMutationApi = { batchUpdate: vi.fn(), batchCreate };
      const manager = new ConflictRetryManager(api, new LockVersionCache(new MockDataTableService()), {
        retry: FAST,
      });
      return { manager, batchCreate };
    }

    it("should keep the written rows and fail only the interrupted ones", async () => {
      const unavailable = Object.assign(new Error("Service unavailable"), { name: "ServiceUnavailableException" });
      const { manager, batchCreate } = interruptedApi(unavailable);

      const execution = await manager.execute("create", makeTable("NONE"), [mutation("1"), mutation("2")]);

      expect([...execution.results.values()]).toEqual([
        { key: JSON.stringify(["1"]), status: "success" },
        {
          key: JSON.stringify(["2"]),
          status: "failed",
          reason: "transport",
          message: "batch create failed: Service unavailable",
        },
      ]);
      expect(batchCreate).toHaveBeenCalledTimes(1);
    });

    it("should resend only the interrupted rows after a thrown conflict", async () => {
      const conflict = Object.assign(new Error("Lock version mismatch"), { name: "ConflictException" });
      const { manager, batchCreate } = interruptedApi(conflict);

      const execution = await manager.execute("create", makeTable("NONE"), [mutation("1"), mutation("2")]);

      expect(batchCreate).toHaveBeenCalledTimes(2);
      expect(batchCreate.mock.calls[1]?.[1].map((m) => m.key)).toEqual([JSON.stringify(["2"])]);
      expect(execution.results.get(JSON.stringify(["2"]))?.status).toBe("success");
      expect(execution.retries).toBe(1);
    });
  });
});
