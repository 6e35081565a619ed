import { SERVICE } from './config.js';
import { delay } from './delay.js';
import { EnvironmentSensor } from './sensor.js';
import type { OutboundMessage, SensorType, TelemetryRecord } from './types.js';

/** The part of a session the publish loops may touch. */
export interface MessageSink {
  publish(message: OutboundMessage): Promise<void>;
}

export interface PublishLoopOptions {
  intervalMs: number;
  signal: AbortSignal;
}

// Field order is part of the wire format
export function createMessageBody(record: TelemetryRecord): string {
  return JSON.stringify({
    temperature: record.temperature,
    humidity: record.humidity,
    pressure: record.pressure,
    latitude: record.latitude,
    longitude: record.longitude,
  });
}

export function createMessage(record: TelemetryRecord, tag: SensorType): OutboundMessage {
  return {
    body: Buffer.from(createMessageBody(record), 'utf8'),
    properties: { SensorType: tag },
  };
}

/**
 * Read, publish, wait; until `signal` aborts. Publish failures propagate
 * and end the loop.
 */
export async function runPublishLoop(
  sink: MessageSink,
  tag: SensorType,
  sensor: EnvironmentSensor,
  { intervalMs, signal }: PublishLoopOptions,
): Promise<void> {
  while (!signal.aborted) {
    const message = createMessage(sensor.read(), tag);
    await sink.publish(message);
    console.log(`${new Date().toISOString()} > Sending message: ${message.body.toString('utf8')}`);
    if (signal.aborted) break;
    await delay(intervalMs, signal);
  }
}

export interface TelemetryPublisherOptions {
  intervalMs: number;
  createSensor?: () => EnvironmentSensor;
}

/** Runs the telemetry and log loops side by side over one session. */
export class TelemetryPublisher {
  static readonly TAGS: readonly SensorType[] = ['Stelemetry', 'Slog'];

  constructor(private readonly sink: MessageSink, private readonly options: TelemetryPublisherOptions) {}

  /**
   * Resolves once both loops have stopped after `signal` aborts. If a loop
   * fails, the other is stopped too and the first failure is rethrown.
   */
  async run(signal: AbortSignal): Promise<void> {
    const loops = new AbortController();
    const stop = () => loops.abort();
    if (signal.aborted) loops.abort();
    else signal.addEventListener('abort', stop, { once: true });

    const createSensor = this.options.createSensor ?? (() => new EnvironmentSensor());
    const failures: unknown[] = [];
    const run = (tag: SensorType) =>
      runPublishLoop(this.sink, tag, createSensor(), { intervalMs: this.options.intervalMs, signal: loops.signal })
        .catch((err: unknown) => {
          console.error(`[${SERVICE}] ${tag} loop stopped:`, err instanceof Error ? err.message : err);
          failures.push(err);
          loops.abort();
        });

    console.log(`[${SERVICE}] start reading and sending device telemetry...`);
    try {
      await Promise.all(TelemetryPublisher.TAGS.map(run));
    } finally {
      signal.removeEventListener('abort', stop);
    }
    if (failures.length > 0) throw failures[0];
  }
}
