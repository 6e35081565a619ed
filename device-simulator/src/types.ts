// Shared shapes passed between the simulator's stages
export type Json = Record<string, unknown>;

/**
 * Certificate-backed device identity. Loaded once from the credential bundle
 * and frozen; the same object authenticates both provisioning and the hub session.
 */
export interface Identity {
  readonly certificatePem: string;
  readonly privateKeyPem: string;
  readonly thumbprint: string;       // SHA-1 of the certificate DER, upper-case hex
  readonly subject: string;          // e.g. "CN=sim-device-01, O=Contoso"
  readonly registrationId: string;   // subject common name
}

export type RegistrationStatus = 'Assigned' | 'Failed' | 'Disabled' | 'Unassigned';

export interface AssignedRegistration {
  readonly status: 'Assigned';
  readonly assignedHub: string;
  readonly deviceId: string;
}

export interface UnassignedRegistration {
  readonly status: Exclude<RegistrationStatus, 'Assigned'>;
  readonly errorCode?: number;
  readonly errorMessage?: string;
}

export type RegistrationResult = AssignedRegistration | UnassignedRegistration;

export interface TelemetryRecord {
  temperature: number;
  humidity: number;
  pressure: number;
  latitude: number;
  longitude: number;
}

export type SensorType = 'Stelemetry' | 'Slog';

/** Serialized reading plus out-of-band properties the broker can filter on. */
export interface OutboundMessage {
  readonly body: Buffer;
  readonly properties: Readonly<{ SensorType: SensorType }>;
}
