import { ValidationFailure } from "../../src/errors";
import {
  handleListCredentials,
  handleRegister,
  handleRename,
  handleRevoke,
  handleRotate,
  type DeviceAdminDeps,
} from "../../src/routes/devices";
import { T0, buildHarness } from "../helpers/fakes";

function deps(): { d: DeviceAdminDeps; h: ReturnType<typeof buildHarness> } {
  const h = buildHarness();
  return { h, d: { devices: h.devices, verifier: h.verifier, keyRotationLimiter: h.keyRotationLimiter, credentialTtlDays: 30 } };
}

const registration = { serial_number: "TS-0001", owner_id: "owner-1", owner_email: "owner@example.com", name: "Hall" };

function field(body: unknown, key: string): unknown {
  return typeof body === "object" && body !== null ? Object.entries(body).find(([k]) => k === key)?.[1] : undefined;
}

describe("device provisioning", () => {
  it("registers a device and returns its secret once", async () => {
    const { d, h } = deps();

    const reply = await handleRegister(d, registration);

    expect(reply.status).toBe(201);
    expect(reply.body).toMatchObject({
      device: {
        serial_number: "TS-0001",
        owner_id: "owner-1",
        name: "Hall",
        created_at: T0.toISOString(),
        last_seen: null,
        last_ip: null,
      },
      expires_at: "2026-03-31T12:00:00.000Z",
    });
    const secret = field(reply.body, "api_key");
    expect(typeof secret).toBe("string");
    if (typeof secret === "string") {
      await expect(h.verifier.verify("TS-0001", secret)).resolves.not.toBeNull();
    }
  });

  it("re-registers for the same owner with a fresh secret", async () => {
    const { d, h } = deps();
    const first = field((await handleRegister(d, registration)).body, "api_key");

    const reply = await handleRegister(d, registration);

    expect(reply.status).toBe(200);
    expect(field(reply.body, "api_key")).not.toBe(first);
    if (typeof first === "string") await expect(h.verifier.verify("TS-0001", first)).resolves.toBeNull();
  });

  it("refuses a serial owned by someone else", async () => {
    const { d } = deps();
    await handleRegister(d, registration);

    const reply = await handleRegister(d, { ...registration, owner_id: "owner-2" });

    expect(reply).toEqual({
      status: 409,
      body: {
        status: "error",
        code: "CONFLICT",
        message: "This device serial is already registered to another owner.",
      },
    });
  });

  it("throws a validation failure for a missing owner", async () => {
    const { d } = deps();
    await expect(handleRegister(d, { serial_number: "TS-0001" })).rejects.toBeInstanceOf(ValidationFailure);
  });

  it("renames a device", async () => {
    const { d } = deps();
    await handleRegister(d, registration);

    const reply = await handleRename(d, "TS-0001", { name: "Bedroom" });
    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({ device: { name: "Bedroom" } });
  });

  it("returns 404 when renaming an unknown device", async () => {
    const { d } = deps();
    await expect(handleRename(d, "TS-9999", { name: "x" })).resolves.toMatchObject({ status: 404 });
  });
});

describe("credential management", () => {
  it("rotates to a new secret", async () => {
    const { d, h } = deps();
    const original = field((await handleRegister(d, registration)).body, "api_key");

    const reply = await handleRotate(d, "TS-0001");

    expect(reply.status).toBe(200);
    const rotated = field(reply.body, "api_key");
    expect(rotated).not.toBe(original);
    if (typeof original === "string") await expect(h.verifier.verify("TS-0001", original)).resolves.toBeNull();
  });

  it("lists credentials newest first without secrets", async () => {
    const { d, h } = deps();
    await handleRegister(d, registration);
    h.clock.advance(1000);
    await handleRotate(d, "TS-0001");

    const reply = await handleListCredentials(d, "TS-0001");

    expect(reply.body).toMatchObject({
      device_id: "TS-0001",
      count: 2,
      results: [
        { created_at: "2026-03-01T12:00:01.000Z", is_active: true },
        { created_at: "2026-03-01T12:00:00.000Z", is_active: false },
      ],
    });
    expect(JSON.stringify(reply.body)).not.toContain("plain:");
  });

  it("revokes a credential by id", async () => {
    const { d, h } = deps();
    await handleRegister(d, registration);
    const [active] = await h.verifier.list("TS-0001");

    const reply = await handleRevoke(d, "TS-0001", active.id);

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({ device_id: "TS-0001", key: { id: active.id, is_active: false } });
  });

  it("answers 404 for an id that is not a uuid or not the device's", async () => {
    const { d } = deps();
    await handleRegister(d, registration);

    await expect(handleRevoke(d, "TS-0001", "42")).resolves.toMatchObject({ status: 404 });
    await expect(
      handleRevoke(d, "TS-0001", "0b7e4c1e-7a0f-4d39-9d5c-3f0a8c2b1e11")
    ).resolves.toMatchObject({ status: 404 });
  });

  it("allows five key changes per device per hour", async () => {
    const { d, h } = deps();
    await handleRegister(d, registration);
    await handleRegister(d, { ...registration, serial_number: "TS-0002" });

    const statuses = [];
    for (let i = 0; i < 5; i++) statuses.push((await handleRotate(d, "TS-0001")).status);
    const sixth = await handleRotate(d, "TS-0001");

    expect(statuses).toEqual([200, 200, 200, 200, 200]);
    expect(sixth).toEqual({
      status: 429,
      body: { status: "error", code: "RATE_LIMIT_EXCEEDED", message: "Too many requests. Please try again later." },
      headers: { "Retry-After": "3600" },
    });
    await expect(handleRotate(d, "TS-0002")).resolves.toMatchObject({ status: 200 });

    h.clock.advance(60 * 60_000);
    await expect(handleRotate(d, "TS-0001")).resolves.toMatchObject({ status: 200 });
  });

  it("counts revocations against the same allowance", async () => {
    const { d, h } = deps();
    await handleRegister(d, registration);
    for (let i = 0; i < 4; i++) await handleRotate(d, "TS-0001");
    const [active] = await h.verifier.list("TS-0001");

    await expect(handleRevoke(d, "TS-0001", active.id)).resolves.toMatchObject({ status: 200 });
    await expect(handleRevoke(d, "TS-0001", active.id)).resolves.toMatchObject({ status: 429 });
  });

  it("does not spend the allowance on an unknown device", async () => {
    const { d, h } = deps();

    await expect(handleRotate(d, "TS-9999")).resolves.toMatchObject({ status: 404 });
    await expect(h.keyRotationLimiter.consume("TS-9999")).resolves.toMatchObject({ count: 1 });
  });
});
