/**
 * Device provisioning client
 * ---------------------------------------------
 * One registration attempt per call, authenticated with the device
 * certificate, over MQTT.
 *
 * Messaging Contracts
 * - Subscribe: `$dps/registrations/res/#`
 * - Register:  `$dps/registrations/PUT/iotdps-register/?$rid={rid}`  body `{ registrationId }`
 * - Poll:      `$dps/registrations/GET/iotdps-get-operationstatus/?$rid={rid}&operationId={op}`
 * - Response:  `$dps/registrations/res/{code}/?$rid={rid}[&retry-after={seconds}]`
 *
 * `202` means the assignment is still running: wait `retry-after` (or the
 * configured poll interval) and ask for the operation status. A `200` whose
 * status is no longer `assigning` is terminal.
 */
import { SERVICE, brokerUrl } from './config.js';
import { delay } from './delay.js';
import { AuthenticationError, ProvisioningError, TransportError, errorMessage } from './errors.js';
import type { ChannelFactory, Channel, ConnectionOptions } from './transport.js';
import type { AssignedRegistration, Identity, Json, RegistrationResult, RegistrationStatus } from './types.js';

const API_VERSION = '2019-03-31';

export const PROVISIONING_TOPICS = {
  responses: '$dps/registrations/res/#',
  register: (rid: number) => `$dps/registrations/PUT/iotdps-register/?$rid=${rid}`,
  operationStatus: (rid: number, operationId: string) =>
    `$dps/registrations/GET/iotdps-get-operationstatus/?$rid=${rid}&operationId=${encodeURIComponent(operationId)}`,
};

const RESPONSE_PREFIX = '$dps/registrations/res/';

export interface ProvisioningResponse {
  statusCode: number;
  requestId: number;
  retryAfterSeconds?: number;
  body: Json;
}

export interface ProvisioningOptions extends ConnectionOptions {
  timeoutMs: number;
  pollIntervalMs: number;
}

function isJsonObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns null for topics that are not provisioning responses; throws on malformed ones. */
export function parseResponse(topic: string, payload: Buffer): ProvisioningResponse | null {
  if (!topic.startsWith(RESPONSE_PREFIX)) return null;
  const [code, query = ''] = topic.slice(RESPONSE_PREFIX.length).split('/?');
  const params = new URLSearchParams(query);
  const statusCode = Number(code);
  const requestId = Number(params.get('$rid'));
  if (!Number.isInteger(statusCode) || !params.has('$rid') || !Number.isInteger(requestId)) {
    throw new TransportError(`malformed provisioning response topic: ${topic}`);
  }
  const retryAfter = params.get('retry-after');
  let body: unknown = {};
  if (payload.length) {
    try {
      body = JSON.parse(payload.toString('utf8'));
    } catch (e) {
      throw new TransportError(`malformed provisioning response body on ${topic}: ${errorMessage(e)}`, { cause: e });
    }
  }
  if (!isJsonObject(body)) {
    throw new TransportError(`provisioning response on ${topic} is not a JSON object`);
  }
  return {
    statusCode,
    requestId,
    retryAfterSeconds: retryAfter !== null && Number(retryAfter) > 0 ? Number(retryAfter) : undefined,
    body,
  };
}

const TERMINAL_STATUSES = new Map<string, RegistrationStatus>([
  ['assigned', 'Assigned'],
  ['failed', 'Failed'],
  ['disabled', 'Disabled'],
  ['unassigned', 'Unassigned'],
]);

function str(value: unknown): string | undefined {
  return typeof value === 'string' && value ? value : undefined;
}

/** Maps a terminal `200` operation body onto a RegistrationResult. */
export function toRegistrationResult(body: Json): RegistrationResult {
  const state: Json = isJsonObject(body.registrationState) ? body.registrationState : {};
  const raw = str(body.status) ?? str(state.status);
  const status = raw ? TERMINAL_STATUSES.get(raw.toLowerCase()) : undefined;
  if (!status) throw new TransportError(`unexpected registration status '${raw ?? 'missing'}'`);
  if (status === 'Assigned') {
    const assignedHub = str(state.assignedHub);
    const deviceId = str(state.deviceId);
    if (!assignedHub || !deviceId) throw new TransportError('assigned registration is missing assignedHub or deviceId');
    return { status, assignedHub, deviceId };
  }
  return {
    status,
    errorCode: typeof state.errorCode === 'number' ? state.errorCode : undefined,
    errorMessage: str(state.errorMessage),
  };
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new TransportError('provisioning aborted');
}

// Settles with `work`, or rejects with the abort reason if `signal` aborts first
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

// Publishes one request and waits for the response carrying the same $rid
function request(channel: Channel, topic: string, body: string, rid: number, signal: AbortSignal): Promise<ProvisioningResponse> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      offMessage();
      offLost();
      signal.removeEventListener('abort', onAbort);
    };
    const settle = (fn: () => void) => {
      cleanup();
      fn();
    };
    const onAbort = () => settle(() => reject(abortReason(signal)));
    const offMessage = channel.onMessage((t, payload) => {
      let response: ProvisioningResponse | null;
      try {
        response = parseResponse(t, payload);
      } catch (e) {
        settle(() => reject(e));
        return;
      }
      if (!response || response.requestId !== rid) return;
      const matched = response;
      settle(() => resolve(matched));
    });
    const offLost = channel.onLost((err) => settle(() => reject(err)));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    channel.publish(topic, body, 1).catch((err: unknown) => {
      settle(() => reject(err instanceof TransportError ? err : new TransportError(`publish to ${topic} failed: ${errorMessage(err)}`, { cause: err })));
    });
  });
}

export class ProvisioningClient {
  constructor(private readonly openChannel: ChannelFactory, private readonly options: ProvisioningOptions) {}

  /**
   * Registers the identity with the provisioning service. Resolves only for an
   * Assigned result; every other terminal status rejects with ProvisioningError.
   */
  async register(endpoint: string, scopeId: string, identity: Identity): Promise<AssignedRegistration> {
    console.log(`[${SERVICE}] RegistrationID = ${identity.registrationId}`);
    console.log(`[${SERVICE}] ProvisioningClient register . . .`);
    const result = await this.handshake(endpoint, scopeId, identity);
    if (result.status !== 'Assigned') {
      console.error(`[${SERVICE}] device registration status: ${result.status}`);
      const detail = result.errorMessage ? ` (${result.errorCode ?? 'no code'}: ${result.errorMessage})` : '';
      throw new ProvisioningError(result.status, `registration status is ${result.status}, expected Assigned${detail}`);
    }
    console.log(`[${SERVICE}] device registration status: ${result.status}`);
    console.log(`[${SERVICE}] ProvisioningClient assignedHub: ${result.assignedHub}; deviceId: ${result.deviceId}`);
    return result;
  }

  private async handshake(endpoint: string, scopeId: string, identity: Identity): Promise<RegistrationResult> {
    const channel = await this.openChannel({
      url: brokerUrl(endpoint, this.options.transport),
      clientId: identity.registrationId,
      username: `${scopeId}/registrations/${identity.registrationId}/api-version=${API_VERSION}`,
      certificatePem: identity.certificatePem,
      privateKeyPem: identity.privateKeyPem,
      ca: this.options.ca,
      rejectUnauthorized: this.options.rejectUnauthorized,
      keepaliveSeconds: this.options.keepaliveSeconds,
      connectTimeoutMs: this.options.connectTimeoutMs,
    });
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new TransportError(`provisioning timed out after ${this.options.timeoutMs} ms`)),
      this.options.timeoutMs,
    );
    try {
      await untilAborted(channel.subscribe(PROVISIONING_TOPICS.responses), controller.signal);
      return await this.exchange(channel, identity, controller.signal);
    } finally {
      clearTimeout(timer);
      await channel.close();
    }
  }

  private async exchange(channel: Channel, identity: Identity, signal: AbortSignal): Promise<RegistrationResult> {
    let rid = 1;
    let response = await request(
      channel,
      PROVISIONING_TOPICS.register(rid),
      JSON.stringify({ registrationId: identity.registrationId }),
      rid,
      signal,
    );
    for (;;) {
      const { statusCode, body } = response;
      const operationId = str(body.operationId);
      const assigning = statusCode === 202 || (statusCode === 200 && str(body.status)?.toLowerCase() === 'assigning');
      if (assigning) {
        if (!operationId) throw new TransportError(`provisioning response ${statusCode} is missing operationId`);
        const waitMs = response.retryAfterSeconds ? response.retryAfterSeconds * 1000 : this.options.pollIntervalMs;
        console.log(`[${SERVICE}] registration assigning (operationId=${operationId}); polling in ${waitMs} ms`);
        await delay(waitMs, signal);
        if (signal.aborted) throw abortReason(signal);
        rid += 1;
        response = await request(channel, PROVISIONING_TOPICS.operationStatus(rid, operationId), '', rid, signal);
        continue;
      }
      if (statusCode === 200) return toRegistrationResult(body);
      const message = str(body.message) ?? `status ${statusCode}`;
      if (statusCode === 401 || statusCode === 403) {
        throw new AuthenticationError(`provisioning service rejected certificate ${identity.thumbprint}: ${message}`);
      }
      if (statusCode === 429 || statusCode >= 500) {
        throw new TransportError(`provisioning service unavailable (${statusCode}): ${message}`);
      }
      return {
        status: 'Failed',
        errorCode: typeof body.errorCode === 'number' ? body.errorCode : statusCode,
        errorMessage: message,
      };
    }
  }
}
