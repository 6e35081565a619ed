/**
 * Channel abstraction shared by provisioning and the hub session.
 * A Channel is an already-accepted, certificate-authenticated broker
 * connection; `ChannelFactory` settles only after CONNACK.
 */
import type { TransportKind } from './config.js';

export interface ConnectionOptions {
  transport: TransportKind;
  ca?: Buffer;
  rejectUnauthorized: boolean;
  keepaliveSeconds: number;
  connectTimeoutMs: number;
}

export interface ChannelOptions {
  url: string;
  clientId: string;
  username: string;
  certificatePem: string;
  privateKeyPem: string;
  ca?: Buffer;
  rejectUnauthorized: boolean;
  keepaliveSeconds: number;
  connectTimeoutMs: number;
}

export type MessageListener = (topic: string, payload: Buffer) => void;
export type LostListener = (err: Error) => void;

export interface Channel {
  subscribe(topic: string): Promise<void>;
  publish(topic: string, payload: string | Buffer, qos: 0 | 1): Promise<void>;
  /** Returns an unsubscribe function. */
  onMessage(listener: MessageListener): () => void;
  /** Fires once if the connection drops without `close()` being called. */
  onLost(listener: LostListener): () => void;
  close(): Promise<void>;
}

/** Rejects with AuthenticationError when the credential is refused, TransportError otherwise. */
export type ChannelFactory = (options: ChannelOptions) => Promise<Channel>;
