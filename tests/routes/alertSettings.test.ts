import { ValidationFailure } from "../../src/errors";
import {
  handleGetAlertSettings,
  handlePutAlertSettings,
  type AlertSettingsDeps,
} from "../../src/routes/alertSettings";
import { buildHarness, provisionDevice } from "../helpers/fakes";

async function setup() {
  const h = buildHarness();
  await provisionDevice(h);
  const deps: AlertSettingsDeps = {
    devices: h.devices,
    alertSettings: h.alertSettings,
    alerts: h.alerts,
    clock: h.clock.now,
  };
  return { h, deps };
}

const body = {
  alerts_enabled: true,
  high_enabled: true,
  high_threshold_c: 26,
  low_enabled: false,
  low_threshold_c: 10,
  cooldown_minutes: 15,
  recipient_email: "ops@example.com",
};

describe("alert settings routes", () => {
  it("returns defaults for a device that never saved settings", async () => {
    const { deps } = await setup();

    const reply = await handleGetAlertSettings(deps, "TS-0001");

    expect(reply).toEqual({
      status: 200,
      body: {
        device_id: "TS-0001",
        alerts_enabled: false,
        high_enabled: false,
        high_threshold_c: 30,
        low_enabled: false,
        low_threshold_c: 10,
        cooldown_minutes: 30,
        recipient_email: null,
        state: {
          HIGH: { phase: "ARMED", lastFiredAt: null, armsAt: null },
          LOW: { phase: "ARMED", lastFiredAt: null, armsAt: null },
        },
      },
    });
  });

  it("saves and echoes settings", async () => {
    const { deps, h } = await setup();

    const reply = await handlePutAlertSettings(deps, "TS-0001", body);

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject({ high_threshold_c: 26, cooldown_minutes: 15, recipient_email: "ops@example.com" });
    expect(h.alertSettings.settings.get("TS-0001")?.cooldownMinutes).toBe(15);
  });

  it("stores a missing recipient as null", async () => {
    const { deps, h } = await setup();
    const { recipient_email: _omit, ...withoutRecipient } = body;

    await handlePutAlertSettings(deps, "TS-0001", withoutRecipient);
    expect(h.alertSettings.settings.get("TS-0001")?.recipientEmail).toBeNull();
  });

  it("rejects an inverted band", async () => {
    const { deps } = await setup();
    await expect(
      handlePutAlertSettings(deps, "TS-0001", { ...body, low_enabled: true, low_threshold_c: 27 })
    ).rejects.toBeInstanceOf(ValidationFailure);
  });

  it("answers 404 for an unknown device", async () => {
    const { deps } = await setup();
    await expect(handleGetAlertSettings(deps, "TS-9999")).resolves.toMatchObject({ status: 404 });
    await expect(handlePutAlertSettings(deps, "TS-9999", body)).resolves.toMatchObject({ status: 404 });
  });
});
