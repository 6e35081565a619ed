/**
 * X.509 Simulated Device
 * ---------------------------------------------
 * Purpose
 * - Provision a device identity held in a PKCS#12 bundle, then stream
 *   synthetic environment telemetry to the assigned hub.
 *
 * Responsibilities
 * - Select the first key-bearing certificate of the bundle.
 * - Register with the provisioning service over MQTT (certificate auth).
 * - Open a certificate-authenticated MQTT session to the assigned hub.
 * - Publish `Stelemetry` and `Slog` readings every TELEMETRY_INTERVAL_MS.
 *
 * Environment & Dependencies
 * - CERT_BUNDLE_PATH / CERT_BUNDLE_PASSWORD: credential bundle (.pfx).
 * - PROVISIONING_SCOPE_ID, PROVISIONING_ENDPOINT: provisioning tenant and host.
 * - PROVISIONING_TRANSPORT / HUB_TRANSPORT: `tcp` (mqtts:8883) or `websocket` (wss:443).
 * - MQTT_TLS_CA, MQTT_TLS_REJECT_UNAUTHORIZED: server certificate verification.
 * - Values may also come from a `.env` file in the working directory.
 *
 * Operational Notes
 * - No retry or reconnect: every setup failure and every publish failure is fatal.
 * - Exit codes: 0 after SIGINT/SIGTERM, otherwise the failing error's exit code.
 *
 * Security Notes
 * - Never log the bundle password or key material.
 */
import dotenv from 'dotenv';
import { SERVICE, loadConfig } from './config.js';
import { createDependencies, runDevice } from './device.js';
import { DeviceError, errorMessage, exitCodeFor } from './errors.js';
import { registerShutdown } from './shutdown.js';

// Load environment variables
dotenv.config();

async function main() {
  console.log(`[${SERVICE}] starting...`);
  const config = loadConfig();
  console.log(
    `[${SERVICE}] config: bundle=${config.bundlePath} endpoint=${config.endpoint} scope=${config.scopeId} transport=${config.provisioningTransport}/${config.hubTransport}`
  );
  const controller = registerShutdown();
  await runDevice(config, createDependencies(config), controller.signal);
  console.log(`[${SERVICE}] stopped`);
}

main().catch((e: unknown) => {
  const code = e instanceof DeviceError ? e.code : 'unexpected';
  console.error(`[${SERVICE}] fatal ${code}: ${errorMessage(e)}`);
  process.exitCode = exitCodeFor(e);
});
