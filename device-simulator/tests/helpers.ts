/* ------------------------------------------------------------------ */
/*  Shared fixtures: in-process broker stand-ins and PKCS#12 bundles.  */
/* ------------------------------------------------------------------ */

import { mkdtempSync, writeFileSync } from 'fs';
import type { AddressInfo } from 'net';
import { tmpdir } from 'os';
import path from 'path';
import tls from 'tls';
import mqttPacket, { type Packet } from 'mqtt-packet';
import forge from 'node-forge';
import { vi } from 'vitest';
import { TransportError } from '../src/errors.js';
import type { Channel, ChannelFactory, ChannelOptions, LostListener, MessageListener } from '../src/transport.js';
import type { Identity, Json } from '../src/types.js';

/** Mutes console output; returns the `console.log` spy for assertions. */
export function silenceConsole() {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  return vi.spyOn(console, 'log').mockImplementation(() => undefined);
}

export const testIdentity: Identity = Object.freeze({
  certificatePem: 'test-certificate-pem',
  privateKeyPem: 'test-private-key-pem',
  thumbprint: '0011223344556677889900112233445566778899',
  subject: 'CN=sim-device-01',
  registrationId: 'sim-device-01',
});

export interface PublishedMessage {
  topic: string;
  payload: Buffer;
  qos: 0 | 1;
}

export type Responder = (channel: FakeChannel, topic: string, payload: Buffer) => void;

/** Channel stand-in: records traffic and lets a responder script replies. */
export class FakeChannel implements Channel {
  readonly published: PublishedMessage[] = [];
  readonly subscriptions: string[] = [];
  closed = false;
  failPublishWith: Error | null = null;
  publishDelayMs = 0;
  // Never answer subscribes, like a service that drops the SUBSCRIBE
  holdSubscriptions = false;
  // Never acknowledge publishes, like a link that died mid-send
  holdPublishes = false;
  inFlight = 0;
  maxInFlight = 0;
  private readonly messageListeners = new Set<MessageListener>();
  private readonly lostListeners = new Set<LostListener>();

  constructor(private readonly responder?: Responder) {}

  async subscribe(topic: string): Promise<void> {
    this.subscriptions.push(topic);
    if (this.holdSubscriptions) await new Promise<void>(() => undefined);
  }

  async publish(topic: string, payload: string | Buffer, qos: 0 | 1): Promise<void> {
    if (this.closed) throw new TransportError('channel closed');
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.holdPublishes) await new Promise<void>(() => undefined);
      if (this.publishDelayMs > 0) await new Promise((r) => setTimeout(r, this.publishDelayMs));
      if (this.failPublishWith) throw this.failPublishWith;
      const body = typeof payload === 'string' ? Buffer.from(payload) : payload;
      this.published.push({ topic, payload: body, qos });
      this.responder?.(this, topic, body);
    } finally {
      this.inFlight -= 1;
    }
  }

  /** Delivers an inbound message on the next turn of the event loop. */
  deliver(topic: string, body: Json | string): void {
    const payload = Buffer.from(typeof body === 'string' ? body : JSON.stringify(body));
    setImmediate(() => {
      for (const listener of [...this.messageListeners]) listener(topic, payload);
    });
  }

  drop(): void {
    const err = new TransportError('connection lost');
    for (const listener of [...this.lostListeners]) listener(err);
  }

  onMessage(listener: MessageListener): () => void {
    this.messageListeners.add(listener);
    return () => {
      this.messageListeners.delete(listener);
    };
  }

  onLost(listener: LostListener): () => void {
    this.lostListeners.add(listener);
    return () => {
      this.lostListeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Channel factory recording every connection attempt. */
export class FakeBroker {
  readonly connections: ChannelOptions[] = [];
  readonly channels: FakeChannel[] = [];

  constructor(private readonly accept: (options: ChannelOptions) => FakeChannel | Error) {}

  readonly open: ChannelFactory = async (options) => {
    this.connections.push(options);
    const result = this.accept(options);
    if (result instanceof Error) throw result;
    this.channels.push(result);
    return result;
  };
}

function requestId(topic: string): string {
  return new URLSearchParams(topic.split('/?')[1] ?? '').get('$rid') ?? '';
}

/**
 * Scripted provisioning service: answers the register request with 202,
 * reports `assigning` for `pendingPolls` status queries, then `final`.
 */
export function provisioningResponder(final: Json, options: { pendingPolls?: number } = {}): Responder {
  let polls = 0;
  return (channel, topic) => {
    const rid = requestId(topic);
    if (topic.startsWith('$dps/registrations/PUT/iotdps-register/')) {
      channel.deliver(`$dps/registrations/res/202/?$rid=${rid}`, { operationId: 'op-1', status: 'assigning' });
    } else if (topic.startsWith('$dps/registrations/GET/iotdps-get-operationstatus/')) {
      if (polls < (options.pendingPolls ?? 0)) {
        polls += 1;
        channel.deliver(`$dps/registrations/res/200/?$rid=${rid}`, { operationId: 'op-1', status: 'assigning' });
      } else {
        channel.deliver(`$dps/registrations/res/200/?$rid=${rid}`, final);
      }
    }
  };
}

export function assignedBody(assignedHub: string, deviceId: string): Json {
  return {
    operationId: 'op-1',
    status: 'assigned',
    registrationState: { registrationId: 'sim-device-01', assignedHub, deviceId, status: 'assigned' },
  };
}

export function terminalBody(status: 'failed' | 'disabled' | 'unassigned'): Json {
  return {
    operationId: 'op-1',
    status,
    registrationState: { registrationId: 'sim-device-01', status },
  };
}

/* ----------------------------- bundles ----------------------------- */

export interface TestCertificate {
  cert: forge.pki.Certificate;
  key: forge.pki.rsa.PrivateKey;
}

export function makeCertificate(subject: { commonName?: string; organizationName?: string }, serial = '01'): TestCertificate {
  const keys = forge.pki.rsa.generateKeyPair({ bits: 1024, e: 0x10001 });
  const cert = forge.pki.createCertificate();
  cert.publicKey = keys.publicKey;
  cert.serialNumber = serial;
  cert.validity.notBefore = new Date(Date.UTC(2024, 0, 1));
  cert.validity.notAfter = new Date(Date.UTC(2034, 0, 1));
  const attrs: forge.pki.CertificateField[] = [];
  if (subject.commonName) attrs.push({ name: 'commonName', value: subject.commonName });
  if (subject.organizationName) attrs.push({ name: 'organizationName', value: subject.organizationName });
  cert.setSubject(attrs);
  cert.setIssuer(attrs);
  cert.sign(keys.privateKey, forge.md.sha256.create());
  return { cert, key: keys.privateKey };
}

/** PKCS#12 bytes; `key` pairs with the first certificate of `certs`. */
export function pkcs12(key: forge.pki.rsa.PrivateKey | null, certs: forge.pki.Certificate[], password: string): Buffer {
  const asn1 = forge.pkcs12.toPkcs12Asn1(key, certs, password, { algorithm: '3des' });
  return Buffer.from(forge.asn1.toDer(asn1).getBytes(), 'binary');
}

/** `testIdentity` carrying real PEM material, for connections that do TLS. */
export function testIdentityFor(credential: TestCertificate): Identity {
  return Object.freeze({
    ...testIdentity,
    certificatePem: forge.pki.certificateToPem(credential.cert),
    privateKeyPem: forge.pki.privateKeyToPem(credential.key),
  });
}

export function writeBundle(bytes: Buffer, name = 'device.pfx'): string {
  const dir = mkdtempSync(path.join(tmpdir(), 'simulated-device-'));
  const file = path.join(dir, name);
  writeFileSync(file, bytes);
  return file;
}

/* --------------------------- TLS broker ---------------------------- */

export interface BrokerConnection {
  /** Writes one MQTT packet to the client. */
  send(packet: Packet): void;
  /** Drops the TCP connection without a DISCONNECT. */
  destroy(): void;
}

export type PacketHandler = (packet: Packet, connection: BrokerConnection) => void;

/** Accepts every CONNECT and acknowledges SUBSCRIBE and QoS 1 PUBLISH. */
export const acceptAll: PacketHandler = (packet, connection) => {
  if (packet.cmd === 'connect') connection.send({ cmd: 'connack', returnCode: 0, sessionPresent: false });
  else if (packet.cmd === 'subscribe') {
    connection.send({ cmd: 'suback', messageId: packet.messageId ?? 0, granted: packet.subscriptions.map((s) => s.qos) });
  } else if (packet.cmd === 'publish' && packet.qos === 1) connection.send({ cmd: 'puback', messageId: packet.messageId ?? 0 });
  else if (packet.cmd === 'pingreq') connection.send({ cmd: 'pingresp' });
};

/**
 * MQTT 3.1.1 server on an ephemeral localhost port over TLS, scripted by a
 * packet handler. Records every packet it receives.
 */
export class TestBroker {
  readonly received: Packet[] = [];
  readonly connections: BrokerConnection[] = [];
  private readonly server: tls.Server;
  private readonly sockets = new Set<tls.TLSSocket>();

  constructor(tlsCert: TestCertificate, handler: PacketHandler = acceptAll) {
    this.server = tls.createServer(
      {
        cert: forge.pki.certificateToPem(tlsCert.cert),
        key: forge.pki.privateKeyToPem(tlsCert.key),
        // Test certificates use 1024-bit keys
        ciphers: 'DEFAULT:@SECLEVEL=0',
      },
      (socket) => {
        this.sockets.add(socket);
        socket.on('close', () => this.sockets.delete(socket));
        // Client resets are expected when a test drops or forces a connection closed
        socket.on('error', () => socket.destroy());
        const parser = mqttPacket.parser();
        const connection: BrokerConnection = {
          send: (packet) => {
            if (!socket.destroyed) socket.write(mqttPacket.generate(packet));
          },
          destroy: () => socket.destroy(),
        };
        this.connections.push(connection);
        parser.on('error', () => socket.destroy());
        parser.on('packet', (packet: Packet) => {
          this.received.push(packet);
          handler(packet, connection);
        });
        socket.on('data', (chunk: Buffer) => parser.parse(chunk));
      },
    );
  }

  async listen(): Promise<string> {
    await new Promise<void>((resolve) => this.server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = this.server.address();
    if (!address || typeof address === 'string') throw new Error('broker has no TCP address');
    return `mqtts://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }
}
