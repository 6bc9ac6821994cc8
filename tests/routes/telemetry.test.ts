import { ValidationFailure } from "../../src/errors";
import { handleRange, handleRecent, type TelemetryQueryDeps } from "../../src/routes/telemetry";
import { buildHarness, ingestRequest, provisionDevice, validBody } from "../helpers/fakes";

async function seeded() {
  const h = buildHarness();
  const { authorization } = await provisionDevice(h);
  for (const temp of [19, 20, 21]) {
    await h.pipeline.run(ingestRequest(authorization, validBody({ temp_inside_c: temp })));
    h.clock.advance(60_000);
  }
  const deps: TelemetryQueryDeps = { devices: h.devices, store: h.store };
  return { h, deps };
}

describe("telemetry query routes", () => {
  it("returns a half-open range oldest first", async () => {
    const { deps } = await seeded();

    const reply = await handleRange(deps, "TS-0001", {
      start: "2026-03-01T12:00:00Z",
      end: "2026-03-01T12:02:00Z",
    });

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({
      device_id: "TS-0001",
      count: 2,
      results: [
        { id: "sample-1", temp_inside_c: 19, server_ts: "2026-03-01T12:00:00.000Z", device_ts: "2026-03-01T11:59:58.000Z" },
        { id: "sample-2", temp_inside_c: 20, server_ts: "2026-03-01T12:01:00.000Z" },
      ],
    });
  });

  it("returns the newest samples first", async () => {
    const { deps } = await seeded();

    const reply = await handleRecent(deps, "TS-0001", { limit: "2" });

    expect(reply.body).toMatchObject({ count: 2, results: [{ id: "sample-3" }, { id: "sample-2" }] });
  });

  it("rejects an inverted range", async () => {
    const { deps } = await seeded();
    await expect(
      handleRange(deps, "TS-0001", { start: "2026-03-01T13:00:00Z", end: "2026-03-01T12:00:00Z" })
    ).rejects.toBeInstanceOf(ValidationFailure);
  });

  it("answers 404 for an unknown device", async () => {
    const { deps } = await seeded();
    await expect(handleRecent(deps, "TS-9999", {})).resolves.toMatchObject({ status: 404 });
  });
});
