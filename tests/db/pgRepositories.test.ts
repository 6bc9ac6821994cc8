// SQL-level tests for the Postgres repositories, against a mocked pg Pool

const mockQuery = jest.fn();
const mockClientQuery = jest.fn();
const mockRelease = jest.fn();
const mockConnect = jest.fn();

jest.mock("pg", () => ({
  Pool: jest.fn().mockImplementation(() => ({ query: mockQuery, connect: mockConnect })),
}));

import { Pool } from "pg";
import { PgDeviceRepository, isUniqueViolation } from "../../src/db/devices";
import { PgStorageProfileRepository } from "../../src/db/storageProfiles";
import { PgTelemetryStore, estimateSampleBytes, payloadBytes } from "../../src/db/telemetry";
import type { NewTelemetrySample } from "../../src/types";
import { T0 } from "../helpers/fakes";

const profileRow = { owner_id: "owner-1", plan: "free", cached_usage_bytes: "2048", usage_calculated_at: T0 };

const deviceRow = {
  serial: "TS-0001",
  owner_id: "owner-1",
  owner_email: "owner@example.com",
  name: "Hall",
  last_seen_at: null,
  last_ip: null,
  created_at: T0,
};

function uniqueViolation(): Error {
  return Object.assign(new Error('duplicate key value violates unique constraint "devices_pkey"'), { code: "23505" });
}

beforeEach(() => {
  mockQuery.mockReset();
  mockClientQuery.mockReset();
  mockRelease.mockReset();
  mockConnect.mockReset();
  mockConnect.mockResolvedValue({ query: mockClientQuery, release: mockRelease });
});

describe("PgStorageProfileRepository.getOrCreate", () => {
  it("reads an existing profile without writing", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [profileRow] });
    const repo = new PgStorageProfileRepository(new Pool());

    const profile = await repo.getOrCreate("owner-1");

    expect(profile).toEqual({ ownerId: "owner-1", plan: "free", cachedUsageBytes: 2048, usageCalculatedAt: T0 });
    expect(mockQuery).toHaveBeenCalledTimes(1);
    expect(mockQuery.mock.calls[0][0]).toMatch(/^SELECT owner_id, plan, cached_usage_bytes, usage_calculated_at FROM storage_profiles/);
  });

  it("inserts without overwriting and reads back when the owner is new", async () => {
    mockQuery
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [], rowCount: 1 })
      .mockResolvedValueOnce({ rows: [{ ...profileRow, cached_usage_bytes: "0", usage_calculated_at: null }] });
    const repo = new PgStorageProfileRepository(new Pool());

    const profile = await repo.getOrCreate("owner-1");

    expect(profile.cachedUsageBytes).toBe(0);
    expect(mockQuery).toHaveBeenCalledTimes(3);
    expect(mockQuery.mock.calls[1]).toEqual([
      "INSERT INTO storage_profiles (owner_id) VALUES ($1) ON CONFLICT (owner_id) DO NOTHING",
      ["owner-1"],
    ]);
  });
});

describe("PgTelemetryStore", () => {
  const rawPayload = { mode: "HEAT", note: "Wohnküche", temp_inside_c: 20.5 };
  const sample: NewTelemetrySample = {
    deviceSerial: "TS-0001",
    mode: "HEAT",
    setpointC: 21,
    tempInsideC: 20.5,
    tempOutsideC: null,
    humidityPercent: null,
    hysteresisC: 0.5,
    output: "HEAT_ON",
    deviceTs: T0,
    rawPayload,
  };

  it("stores the payload size measured the same way as the write charge", async () => {
    mockQuery.mockResolvedValueOnce({
      rows: [
        {
          id: "0b7e4c1e-7a0f-4d39-9d5c-3f0a8c2b1e11",
          device_serial: "TS-0001",
          mode: "HEAT",
          setpoint_c: 21,
          temp_inside_c: 20.5,
          temp_outside_c: null,
          humidity_percent: null,
          hysteresis_c: 0.5,
          output: "HEAT_ON",
          device_ts: T0,
          received_at: T0,
          raw_payload: rawPayload,
        },
      ],
    });
    const store = new PgTelemetryStore(new Pool());

    await store.append(sample);

    const params = mockQuery.mock.calls[0][1];
    expect(params[10]).toBe('{"mode":"HEAT","note":"Wohnküche","temp_inside_c":20.5}');
    expect(params[11]).toBe(payloadBytes(rawPayload));
    expect(estimateSampleBytes(rawPayload)).toBe(300 + params[11]);
  });

  it("counts multi-byte characters in bytes, not characters", () => {
    expect(payloadBytes({ note: "ü" })).toBe(13);
  });

  it("recomputes from the stored sizes", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [{ bytes: "1234" }] });
    const store = new PgTelemetryStore(new Pool());

    await expect(store.estimateUsageByOwner("owner-1")).resolves.toBe(1234);
    expect(mockQuery.mock.calls[0][0]).toContain("SUM($2 + COALESCE(t.payload_bytes, 0))");
    expect(mockQuery.mock.calls[0][1]).toEqual(["owner-1", 300]);
  });

  it("deletes an owner's samples with open bounds passed as null", async () => {
    mockQuery.mockResolvedValueOnce({ rows: [], rowCount: 3 });
    const store = new PgTelemetryStore(new Pool());

    await expect(store.deleteSamples({ ownerId: "owner-1", serial: "TS-0001", start: T0 })).resolves.toBe(3);
    expect(mockQuery.mock.calls[0][1]).toEqual(["owner-1", "TS-0001", T0, null]);
  });
});

describe("PgDeviceRepository.register", () => {
  it("retries once when a concurrent registration created the row first", async () => {
    let inserts = 0;
    mockClientQuery.mockImplementation(async (sql: string) => {
      if (sql.startsWith("INSERT INTO devices")) {
        inserts++;
        throw uniqueViolation();
      }
      if (sql.includes("FOR UPDATE")) return { rows: inserts === 0 ? [] : [{ owner_id: "owner-1" }] };
      if (sql.includes("FROM devices d")) return { rows: [deviceRow] };
      return { rows: [], rowCount: 0 };
    });
    const repo = new PgDeviceRepository(new Pool());

    const result = await repo.register({ serial: "TS-0001", ownerId: "owner-1", name: "Hall" });

    expect(result).toEqual({
      status: "existing",
      device: {
        serial: "TS-0001",
        ownerId: "owner-1",
        ownerEmail: "owner@example.com",
        name: "Hall",
        lastSeenAt: null,
        lastIp: null,
        createdAt: T0,
      },
    });
    expect(inserts).toBe(1);
    expect(mockClientQuery.mock.calls.map((c) => c[0])).toContain("ROLLBACK");
    expect(mockRelease).toHaveBeenCalledTimes(2);
  });

  it("reports a conflict when the concurrent registration was another owner's", async () => {
    let inserts = 0;
    mockClientQuery.mockImplementation(async (sql: string) => {
      if (sql.startsWith("INSERT INTO devices")) {
        inserts++;
        throw uniqueViolation();
      }
      if (sql.includes("FOR UPDATE")) return { rows: inserts === 0 ? [] : [{ owner_id: "owner-2" }] };
      return { rows: [], rowCount: 0 };
    });
    const repo = new PgDeviceRepository(new Pool());

    await expect(repo.register({ serial: "TS-0001", ownerId: "owner-1" })).resolves.toEqual({ status: "conflict" });
  });

  it("does not retry other errors", async () => {
    mockClientQuery.mockImplementation(async (sql: string) => {
      if (sql.startsWith("INSERT INTO devices")) throw Object.assign(new Error("serialization failure"), { code: "40001" });
      return { rows: [], rowCount: 0 };
    });
    const repo = new PgDeviceRepository(new Pool());

    await expect(repo.register({ serial: "TS-0001", ownerId: "owner-1" })).rejects.toThrow("serialization failure");
    expect(mockConnect).toHaveBeenCalledTimes(1);
  });
});

describe("isUniqueViolation", () => {
  it("matches only the unique_violation code", () => {
    expect(isUniqueViolation(uniqueViolation())).toBe(true);
    expect(isUniqueViolation({ code: "23503" })).toBe(false);
    expect(isUniqueViolation(new Error("duplicate"))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
    expect(isUniqueViolation("23505")).toBe(false);
  });
});
