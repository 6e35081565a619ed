/**
 * Device lifecycle
 * ---------------------------------------------
 * load identity -> register -> open session -> publish until cancelled or a
 * loop fails -> close session.
 *
 * Setup failures propagate before any session exists. Once a session is
 * open it is always closed, whether the loops stop on cancellation or fail.
 */
import { existsSync, readFileSync } from 'fs';
import { SERVICE, type DeviceConfig } from './config.js';
import { loadIdentity } from './identity.js';
import { openMqttChannel } from './mqtt.js';
import { ProvisioningClient } from './provisioning.js';
import { TelemetryPublisher } from './publisher.js';
import type { EnvironmentSensor } from './sensor.js';
import { SessionManager, type DeviceSession } from './session.js';
import type { ChannelFactory, ConnectionOptions } from './transport.js';
import type { AssignedRegistration, Identity } from './types.js';

export interface DeviceDependencies {
  loadIdentity(bundlePath: string, bundlePassword: string): Identity;
  provisioning: {
    register(endpoint: string, scopeId: string, identity: Identity): Promise<AssignedRegistration>;
  };
  sessions: {
    open(assignedHub: string, deviceId: string, identity: Identity): Promise<DeviceSession>;
  };
  createSensor?: () => EnvironmentSensor;
}

function readCa(path: string | undefined): Buffer | undefined {
  if (!path) return undefined;
  if (!existsSync(path)) {
    console.warn(`[${SERVICE}] WARNING: MQTT_TLS_CA path set but file not found: ${path}`);
    return undefined;
  }
  return readFileSync(path);
}

/** Wires the production collaborators from configuration. */
export function createDependencies(config: DeviceConfig, openChannel: ChannelFactory = openMqttChannel): DeviceDependencies {
  const ca = readCa(config.tlsCaPath);
  const connection = (transport: DeviceConfig['hubTransport']): ConnectionOptions => ({
    transport,
    ca,
    rejectUnauthorized: config.tlsRejectUnauthorized,
    keepaliveSeconds: config.keepaliveSeconds,
    connectTimeoutMs: config.connectTimeoutMs,
  });
  return {
    loadIdentity,
    provisioning: new ProvisioningClient(openChannel, {
      ...connection(config.provisioningTransport),
      timeoutMs: config.provisioningTimeoutMs,
      pollIntervalMs: config.provisioningPollMs,
    }),
    sessions: new SessionManager(openChannel, connection(config.hubTransport)),
  };
}

/**
 * Runs the device until `signal` aborts (resolves) or a fatal error occurs
 * (rejects with the DeviceError that stopped it).
 */
export async function runDevice(config: DeviceConfig, deps: DeviceDependencies, signal: AbortSignal): Promise<void> {
  const identity = deps.loadIdentity(config.bundlePath, config.bundlePassword);
  const registration = await deps.provisioning.register(config.endpoint, config.scopeId, identity);
  if (signal.aborted) {
    console.log(`[${SERVICE}] cancelled before opening a session`);
    return;
  }

  const session = await deps.sessions.open(registration.assignedHub, registration.deviceId, identity);
  console.log(`[${SERVICE}] simulated device running as ${registration.deviceId}. Ctrl-C to exit.`);
  try {
    const publisher = new TelemetryPublisher(session, {
      intervalMs: config.telemetryIntervalMs,
      createSensor: deps.createSensor,
    });
    await publisher.run(signal);
  } finally {
    console.log(`[${SERVICE}] closing session`);
    await session.close();
  }
}
