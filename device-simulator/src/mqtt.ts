import { connect, IClientOptions, MqttClient } from 'mqtt';
import { SERVICE } from './config.js';
import { AuthenticationError, DeviceError, TransportError, errorMessage } from './errors.js';
import type { Channel, ChannelOptions, LostListener, MessageListener } from './transport.js';

// Map MQTT CONNACK reason codes to human-readable text (MQTT v5 and MQTT v3.1.1)
export function connackReasonText(code: number): string {
  const v5: Record<number, string> = {
    0: 'Success',
    128: 'Unspecified error',
    129: 'Malformed Packet',
    130: 'Protocol Error',
    131: 'Implementation specific error',
    132: 'Unsupported Protocol Version',
    133: 'Client Identifier not valid',
    134: 'Bad User Name or Password',
    135: 'Not authorized',
    136: 'Server unavailable',
    137: 'Server busy',
    138: 'Banned',
    140: 'Bad authentication method',
    149: 'Packet too large',
    151: 'Quota exceeded',
    153: 'Payload format invalid',
    156: 'Use another server',
    157: 'Server moved',
    159: 'Connection rate exceeded',
  };
  const v3: Record<number, string> = {
    0: 'Connection Accepted',
    1: 'Unacceptable protocol version',
    2: 'Identifier rejected',
    3: 'Server unavailable',
    4: 'Bad user name or password',
    5: 'Not authorized',
  };
  return v5[code] || v3[code] || `Unknown (${code})`;
}

// Reason codes meaning the broker refused the credential rather than the connection
const AUTH_REJECTIONS = new Set([4, 5, 134, 135, 138, 140]);

export function connackError(code: number, url: string): DeviceError {
  const text = `${url} refused connection (reasonCode=${code} ${connackReasonText(code)})`;
  return AUTH_REJECTIONS.has(code) ? new AuthenticationError(text) : new TransportError(text);
}

type Settle = (err?: Error) => void;

class MqttChannel implements Channel {
  private readonly lostListeners = new Set<LostListener>();
  // Reject functions of subscribes and publishes still waiting for their ack
  private readonly pending = new Set<(err: Error) => void>();
  private ending = false;
  private lost = false;

  constructor(private readonly client: MqttClient, private readonly url: string) {
    client.on('error', (err) => console.error(`[${SERVICE}] mqtt error (${url}):`, err.message));
    client.on('close', () => {
      // mqtt.js never calls back QoS 1 operations once the stream is gone
      this.rejectPending(new TransportError(`connection to ${url} ${this.ending ? 'closed' : 'lost'}`));
      if (this.ending || this.lost) return;
      this.lost = true;
      console.warn(`[${SERVICE}] mqtt connection lost (${url})`);
      const err = new TransportError(`connection to ${url} lost`);
      for (const listener of [...this.lostListeners]) listener(err);
      this.lostListeners.clear();
    });
  }

  private rejectPending(err: Error): void {
    for (const reject of [...this.pending]) reject(err);
  }

  private track(operation: (settle: Settle) => void): Promise<void> {
    if (this.lost || this.ending) {
      return Promise.reject(new TransportError(`connection to ${this.url} is ${this.lost ? 'lost' : 'closed'}`));
    }
    return new Promise((resolve, reject) => {
      const fail = (err: Error) => {
        this.pending.delete(fail);
        reject(err);
      };
      this.pending.add(fail);
      operation((err) => {
        this.pending.delete(fail);
        if (err) reject(err);
        else resolve();
      });
    });
  }

  subscribe(topic: string): Promise<void> {
    return this.track((settle) => {
      this.client.subscribe(topic, { qos: 1 }, (err, granted) => {
        if (err) settle(new TransportError(`subscribe to ${topic} failed: ${err.message}`, { cause: err }));
        else if (granted?.some((g) => g.qos === 128)) settle(new TransportError(`subscribe to ${topic} refused`));
        else settle();
      });
    });
  }

  publish(topic: string, payload: string | Buffer, qos: 0 | 1): Promise<void> {
    return this.track((settle) => {
      this.client.publish(topic, payload, { qos }, (err) => {
        settle(err ? new TransportError(`publish to ${topic} failed: ${err.message}`, { cause: err }) : undefined);
      });
    });
  }

  onMessage(listener: MessageListener): () => void {
    this.client.on('message', listener);
    return () => {
      this.client.removeListener('message', listener);
    };
  }

  onLost(listener: LostListener): () => void {
    this.lostListeners.add(listener);
    return () => {
      this.lostListeners.delete(listener);
    };
  }

  /** Graceful DISCONNECT when idle; forced when the link is gone or acks are outstanding. */
  close(): Promise<void> {
    this.ending = true;
    const force = this.lost || this.pending.size > 0;
    this.rejectPending(new TransportError(`connection to ${this.url} closed`));
    return new Promise((resolve) => {
      this.client.end(force, {}, () => resolve());
    });
  }
}

/**
 * Connects with the device certificate and resolves once the broker accepts
 * the CONNACK. No automatic reconnect: a refused or dropped connection
 * surfaces as an error to the caller.
 */
export function openMqttChannel(options: ChannelOptions): Promise<Channel> {
  const tls = {
    cert: options.certificatePem,
    key: options.privateKeyPem,
    ca: options.ca,
    rejectUnauthorized: options.rejectUnauthorized,
  };
  const websocket = options.url.startsWith('wss://') || options.url.startsWith('ws://');
  const mqttOptions: IClientOptions = {
    clientId: options.clientId,
    username: options.username,
    protocolVersion: 4,
    clean: true,
    keepalive: options.keepaliveSeconds,
    connectTimeout: options.connectTimeoutMs,
    reconnectPeriod: 0,
    ...tls,
    ...(websocket ? { wsOptions: { ...tls } } : {}),
  };
  console.log(
    `[${SERVICE}] MQTT config: url=${options.url} clientId=${options.clientId} ca=${options.ca ? 'set' : 'system'} rejectUnauthorized=${options.rejectUnauthorized}`
  );

  return new Promise((resolve, reject) => {
    let settled = false;
    const client = connect(options.url, mqttOptions);
    const fail = (err: DeviceError) => {
      if (settled) return;
      settled = true;
      client.end(true);
      reject(err);
    };

    // Inspect CONNACK to explicitly log accept/reject with reason code
    client.on('packetreceive', (packet) => {
      if (packet.cmd !== 'connack') return;
      const reason = packet.reasonCode ?? packet.returnCode ?? 0;
      if (reason === 0) {
        console.log(`[${SERVICE}] CONNACK accepted (reasonCode=0 ${connackReasonText(0)}, sessionPresent=${packet.sessionPresent})`);
      } else {
        console.error(`[${SERVICE}] CONNACK rejected (reasonCode=${reason} ${connackReasonText(reason)})`);
        fail(connackError(reason, options.url));
      }
    });
    client.once('connect', () => {
      if (settled) return;
      settled = true;
      resolve(new MqttChannel(client, options.url));
    });
    client.on('error', (err) => {
      fail(new TransportError(`connection to ${options.url} failed: ${errorMessage(err)}`, { cause: err }));
    });
    client.on('close', () => fail(new TransportError(`connection to ${options.url} closed before CONNACK`)));
  });
}
