// Service configuration and typed environment access
import { ConfigError } from './errors.js';

export const SERVICE = 'device-simulator';

// Global endpoint of the device provisioning service
export const GLOBAL_DEVICE_ENDPOINT = 'global.azure-devices-provisioning.net';

export type TransportKind = 'tcp' | 'websocket';

export interface DeviceConfig {
  bundlePath: string;
  bundlePassword: string;
  scopeId: string;
  endpoint: string;
  provisioningTransport: TransportKind;
  provisioningTimeoutMs: number;
  provisioningPollMs: number;
  hubTransport: TransportKind;
  tlsCaPath?: string;
  tlsRejectUnauthorized: boolean;
  keepaliveSeconds: number;
  connectTimeoutMs: number;
  telemetryIntervalMs: number;
}

function required(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) throw new ConfigError(`${name} is required`);
  return value;
}

function positiveNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got '${raw}'`);
  }
  return value;
}

function transport(env: NodeJS.ProcessEnv, name: string): TransportKind {
  const raw = (env[name] || 'tcp').toLowerCase();
  if (raw !== 'tcp' && raw !== 'websocket') {
    throw new ConfigError(`${name} must be 'tcp' or 'websocket', got '${raw}'`);
  }
  return raw;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeviceConfig {
  return {
    bundlePath: required(env, 'CERT_BUNDLE_PATH'),
    // Empty password is valid for unprotected bundles
    bundlePassword: env.CERT_BUNDLE_PASSWORD ?? '',
    scopeId: required(env, 'PROVISIONING_SCOPE_ID'),
    endpoint: env.PROVISIONING_ENDPOINT || GLOBAL_DEVICE_ENDPOINT,
    provisioningTransport: transport(env, 'PROVISIONING_TRANSPORT'),
    provisioningTimeoutMs: positiveNumber(env, 'PROVISIONING_TIMEOUT_MS', 60000),
    provisioningPollMs: positiveNumber(env, 'PROVISIONING_POLL_MS', 3000),
    hubTransport: transport(env, 'HUB_TRANSPORT'),
    tlsCaPath: env.MQTT_TLS_CA || undefined,
    tlsRejectUnauthorized: (env.MQTT_TLS_REJECT_UNAUTHORIZED ?? 'true') !== 'false',
    keepaliveSeconds: positiveNumber(env, 'MQTT_KEEPALIVE', 60),
    connectTimeoutMs: positiveNumber(env, 'MQTT_CONNECT_TIMEOUT_MS', 30000),
    telemetryIntervalMs: positiveNumber(env, 'TELEMETRY_INTERVAL_MS', 1000),
  };
}

/** Broker URL for a host over the chosen transport. */
export function brokerUrl(host: string, kind: TransportKind): string {
  return kind === 'websocket' ? `wss://${host}:443/$iothub/websocket` : `mqtts://${host}:8883`;
}
