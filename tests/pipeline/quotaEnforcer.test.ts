import { QuotaExceeded } from "../../src/errors";
import {
  PLAN_LIMIT_BYTES,
  formatBytes,
  isStorageFull,
  planLimitBytes,
  summarizeStorage,
} from "../../src/pipeline/quotaEnforcer";
import { buildHarness, ingestRequest, provisionDevice } from "../helpers/fakes";

const GIB = 1024 * 1024 * 1024;

describe("plan limits", () => {
  it("maps each plan to its byte limit", () => {
    expect(planLimitBytes("free")).toBe(2 * GIB);
    expect(planLimitBytes("standard")).toBe(10 * GIB);
    expect(planLimitBytes("premium")).toBe(1024 * GIB);
    expect(Object.keys(PLAN_LIMIT_BYTES)).toEqual(["free", "standard", "premium"]);
  });

  it("treats usage equal to the limit as full", () => {
    const base = { ownerId: "owner-1", plan: "free" as const, usageCalculatedAt: null };
    expect(isStorageFull({ ...base, cachedUsageBytes: 2 * GIB - 1 })).toBe(false);
    expect(isStorageFull({ ...base, cachedUsageBytes: 2 * GIB })).toBe(true);
  });
});

describe("formatBytes", () => {
  it.each([
    [512, "512 bytes"],
    [1536, "1.50 KB"],
    [5 * 1024 * 1024, "5.00 MB"],
    [2 * GIB, "2.00 GB"],
    [1024 * GIB, "1.00 TB"],
  ])("formats %d as %s", (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});

describe("summarizeStorage", () => {
  it("reports usage against the plan", () => {
    const summary = summarizeStorage({
      ownerId: "owner-1",
      plan: "free",
      cachedUsageBytes: GIB,
      usageCalculatedAt: new Date("2026-03-01T11:45:00.000Z"),
    });

    expect(summary).toEqual({
      owner_id: "owner-1",
      plan: "free",
      usage_bytes: GIB,
      limit_bytes: 2 * GIB,
      remaining_bytes: GIB,
      usage_percent: 50,
      usage_display: "1.00 GB",
      limit_display: "2.00 GB",
      is_full: false,
      usage_calculated_at: "2026-03-01T11:45:00.000Z",
    });
  });

  it("caps remaining and percent when over the limit", () => {
    const summary = summarizeStorage({ ownerId: "o", plan: "free", cachedUsageBytes: 3 * GIB, usageCalculatedAt: null });
    expect(summary.remaining_bytes).toBe(0);
    expect(summary.usage_percent).toBe(100);
    expect(summary.is_full).toBe(true);
  });
});

describe("QuotaEnforcer", () => {
  it("admits an owner below the limit and attaches the profile", async () => {
    const h = buildHarness();
    const { device, authorization } = await provisionDevice(h);

    const outcome = await h.quota.gate({ ...ingestRequest(authorization, {}), device });
    expect(outcome.admit).toBe(true);
    if (outcome.admit) expect(outcome.ctx.storage.plan).toBe("free");
  });

  it("rejects an owner at the limit", async () => {
    const h = buildHarness();
    const { device, authorization } = await provisionDevice(h);
    await h.profiles.addUsage("owner-1", 2 * GIB);

    const outcome = await h.quota.gate({ ...ingestRequest(authorization, {}), device });
    expect(outcome.admit).toBe(false);
    if (!outcome.admit) {
      expect(outcome.error).toBeInstanceOf(QuotaExceeded);
      expect(outcome.error.httpStatus).toBe(403);
      expect(outcome.error.code).toBe("STORAGE_LIMIT_EXCEEDED");
    }
  });

  it("lets a plan upgrade lift the block", async () => {
    const h = buildHarness();
    const { device, authorization } = await provisionDevice(h);
    await h.profiles.addUsage("owner-1", 2 * GIB);
    await h.profiles.setPlan("owner-1", "standard");

    const outcome = await h.quota.gate({ ...ingestRequest(authorization, {}), device });
    expect(outcome.admit).toBe(true);
  });

  it("charges accepted writes to the cached figure", async () => {
    const h = buildHarness();
    await h.quota.charge("owner-1", 400);
    await h.quota.charge("owner-1", 350);
    expect((await h.profiles.getOrCreate("owner-1")).cachedUsageBytes).toBe(750);
  });
});
