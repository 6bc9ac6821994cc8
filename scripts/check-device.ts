import { pool } from '../src/db/pool';
import { PgDeviceRepository } from '../src/db/devices';
import { PgCredentialRepository } from '../src/db/credentials';
import { PgStorageProfileRepository } from '../src/db/storageProfiles';
import { PgTelemetryStore } from '../src/db/telemetry';
import { PgAlertSettingsRepository, PgAlertStateStore } from '../src/db/alerts';
import { AlertEvaluator } from '../src/pipeline/alertEvaluator';
import { summarizeStorage } from '../src/pipeline/quotaEnforcer';
import { serializeSample } from '../src/routes/telemetry';
import { errorMessage } from '../src/errors';

const serial = process.argv[2];

async function checkDevice(): Promise<number> {
  if (!serial) {
    console.error('Usage: check-device <serial>');
    return 1;
  }
  console.log(`\n🔍 Checking device: ${serial}\n`);

  const device = await new PgDeviceRepository(pool).findBySerial(serial);
  if (!device) {
    console.log('❌ Device not found in devices table');
    return 1;
  }
  console.log('✅ Device found:');
  console.log(JSON.stringify(device, null, 2));

  console.log('\n🔑 Credentials:');
  const keys = await new PgCredentialRepository(pool).list(serial);
  console.log(JSON.stringify(keys, null, 2));

  console.log('\n📦 Owner storage:');
  const profile = await new PgStorageProfileRepository(pool).getOrCreate(device.ownerId);
  console.log(JSON.stringify(summarizeStorage(profile), null, 2));

  console.log('\n🚨 Alert state:');
  const alerts = new AlertEvaluator(new PgAlertSettingsRepository(pool), new PgAlertStateStore(pool));
  console.log(JSON.stringify(await alerts.describe(serial, new Date()), null, 2));

  console.log('\n📋 Last 5 samples:');
  const recent = await new PgTelemetryStore(pool).recent(serial, 5);
  console.log(JSON.stringify(recent.map(serializeSample), null, 2));

  console.log('\n✅ Device check complete\n');
  return 0;
}

async function main() {
  let code = 1;
  try {
    code = await checkDevice();
  } catch (err) {
    console.error('❌ Error:', errorMessage(err));
  } finally {
    await pool.end();
  }
  process.exit(code);
}

void main();
