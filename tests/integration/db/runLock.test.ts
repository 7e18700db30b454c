/**
 * Run Lock Integration Test
 *
 * Verifies single-owner enforcement, release and takeover of an expired lock.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { acquireRunLock, getRunLock, releaseRunLock, setDbForTesting } from "@/db";

describe("Run lock", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should enforce a single owner and allow reacquisition after release", () => {
    harness = createTestDbSync();

    expect(acquireRunLock("owner-a")).toEqual({ ok: true });
    expect(getRunLock()?.owner_id).toBe("owner-a");

    expect(acquireRunLock("owner-b")).toEqual({ ok: false, reason: "LOCKED" });
    expect(releaseRunLock("owner-b")).toBe(false);

    expect(releaseRunLock("owner-a")).toBe(true);
    expect(getRunLock()).toBeNull();

    expect(acquireRunLock("owner-b")).toEqual({ ok: true });
    expect(getRunLock()?.owner_id).toBe("owner-b");
  });

  it("should take over an expired lock", () => {
    harness = createTestDbSync();

    expect(acquireRunLock("owner-a")).toEqual({ ok: true });
    harness.db
      .prepare("UPDATE run_lock SET expires_at = datetime('now', '-1 minutes')")
      .run();

    expect(acquireRunLock("owner-b")).toEqual({ ok: true });
    expect(getRunLock()?.owner_id).toBe("owner-b");
    expect(releaseRunLock("owner-a")).toBe(false);
  });

  it("should report DB_NOT_OPEN without a connection", () => {
    setDbForTesting(null);

    expect(acquireRunLock("owner-a")).toEqual({ ok: false, reason: "DB_NOT_OPEN" });
  });
});
