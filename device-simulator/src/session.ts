/**
 * Hub session
 * ---------------------------------------------
 * An authenticated MQTT connection to the assigned hub, keyed by
 * (hub, deviceId, identity).
 *
 * States: created -> opening -> open -> closing -> closed,
 *         created -> closed, opening -> failed, open -> failed.
 * Nothing leaves `closed` or `failed`. Once close() has been called every
 * publish fails with SessionClosedError, whatever the state.
 *
 * Messaging Contracts
 * - Events: `devices/{deviceId}/messages/events/{propertyBag}` (QoS 1), where the
 *   property bag is the URL-encoded `key=value&...` form of the message
 *   properties so the broker can route without reading the body.
 */
import { EventEmitter } from 'events';
import { SERVICE, brokerUrl } from './config.js';
import { DeviceError, PublishError, SessionClosedError, TransportError, errorMessage } from './errors.js';
import type { Channel, ChannelFactory, ConnectionOptions } from './transport.js';
import type { Identity, OutboundMessage } from './types.js';

const API_VERSION = '2021-04-12';

export type SessionState = 'created' | 'opening' | 'open' | 'closing' | 'closed' | 'failed';

export function encodePropertyBag(properties: Readonly<Record<string, string>>): string {
  return Object.entries(properties)
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
    .join('&');
}

export function eventsTopic(deviceId: string, properties: Readonly<Record<string, string>> = {}): string {
  return `devices/${deviceId}/messages/events/${encodePropertyBag(properties)}`;
}

export class DeviceSession extends EventEmitter {
  private current: SessionState = 'created';
  private channel: Channel | null = null;
  private offLost: (() => void) | null = null;
  private opening: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  // Serializes sends from concurrent publishers; never rejects
  private sendQueue: Promise<void> = Promise.resolve();

  constructor(
    readonly hub: string,
    readonly deviceId: string,
    private readonly identity: Identity,
    private readonly openChannel: ChannelFactory,
    private readonly options: ConnectionOptions,
  ) {
    super();
  }

  get state(): SessionState {
    return this.current;
  }

  private transition(next: SessionState): void {
    const previous = this.current;
    this.current = next;
    console.log(`[${SERVICE}] session ${this.deviceId}@${this.hub}: ${previous} -> ${next}`);
    this.emit('state', next, previous);
  }

  open(): Promise<void> {
    if (this.current !== 'created') {
      return Promise.reject(new TransportError(`session cannot be opened from state ${this.current}`));
    }
    this.opening = this.connect();
    return this.opening;
  }

  private async connect(): Promise<void> {
    this.transition('opening');
    let channel: Channel;
    try {
      channel = await this.openChannel({
        url: brokerUrl(this.hub, this.options.transport),
        clientId: this.deviceId,
        username: `${this.hub}/${this.deviceId}/?api-version=${API_VERSION}`,
        certificatePem: this.identity.certificatePem,
        privateKeyPem: this.identity.privateKeyPem,
        ca: this.options.ca,
        rejectUnauthorized: this.options.rejectUnauthorized,
        keepaliveSeconds: this.options.keepaliveSeconds,
        connectTimeoutMs: this.options.connectTimeoutMs,
      });
    } catch (e) {
      this.transition('failed');
      throw e instanceof DeviceError ? e : new TransportError(`failed to open session: ${errorMessage(e)}`, { cause: e });
    }
    this.channel = channel;
    this.offLost = channel.onLost((err) => {
      if (this.current !== 'open') return;
      console.error(`[${SERVICE}] session ${this.deviceId} lost: ${err.message}`);
      this.transition('failed');
    });
    this.transition('open');
  }

  async publish(message: OutboundMessage): Promise<void> {
    this.assertPublishable();
    const topic = eventsTopic(this.deviceId, message.properties);
    const send = this.sendQueue.then(async () => {
      // Sends accepted before close() still drain while closing
      const channel = this.channel;
      if (!channel || this.current === 'failed') {
        throw new PublishError(`session ${this.deviceId} is ${this.current}, not open`);
      }
      try {
        await channel.publish(topic, message.body, 1);
      } catch (e) {
        throw new PublishError(`send to ${topic} failed: ${errorMessage(e)}`, { cause: e });
      }
    });
    // Failures reach the caller through `send`; the queue only tracks completion
    this.sendQueue = send.catch(() => undefined);
    return send;
  }

  private assertPublishable(): void {
    if (this.closing) {
      throw new SessionClosedError(`session ${this.deviceId} is closed`);
    }
    if (this.current !== 'open') {
      throw new PublishError(`session ${this.deviceId} is ${this.current}, not open`);
    }
  }

  /** Releases the connection. Repeat calls return the same promise. */
  close(): Promise<void> {
    if (!this.closing) this.closing = this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    if (this.current === 'created') {
      this.transition('closed');
      return;
    }
    if (this.opening) {
      // open() reports its own failure to its caller
      await this.opening.catch(() => undefined);
    }
    const failed = this.current === 'failed';
    if (!failed) {
      this.transition('closing');
      await this.sendQueue;
    }
    this.offLost?.();
    this.offLost = null;
    const channel = this.channel;
    this.channel = null;
    if (channel) {
      try {
        await channel.close();
      } catch (e) {
        console.warn(`[${SERVICE}] error closing session ${this.deviceId}:`, errorMessage(e));
      }
    }
    if (!failed) this.transition('closed');
  }
}

export class SessionManager {
  constructor(private readonly openChannel: ChannelFactory, private readonly options: ConnectionOptions) {}

  /** Opens a session to the assigned hub, authenticated as `deviceId` with the identity's certificate. */
  async open(assignedHub: string, deviceId: string, identity: Identity): Promise<DeviceSession> {
    console.log(`[${SERVICE}] creating X509 session authentication for ${deviceId}`);
    const session = new DeviceSession(assignedHub, deviceId, identity, this.openChannel, this.options);
    await session.open();
    return session;
  }
}
