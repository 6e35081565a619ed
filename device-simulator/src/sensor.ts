import type { TelemetryRecord } from './types.js';

// Lower bound and span of every simulated reading
export const SENSOR_RANGES = {
  temperature: { min: 20, span: 15 },
  humidity: { min: 60, span: 20 },
  pressure: { min: 1013.25, span: 12 },
  latitude: { min: 39.810492, span: 0.5 },
  longitude: { min: -98.556061, span: 0.5 },
} as const;

export interface Location {
  latitude: number;
  longitude: number;
}

/** Pseudo-random environment sensor. Every read is a fresh draw. */
export class EnvironmentSensor {
  constructor(private readonly random: () => number = Math.random) {}

  private draw(range: { min: number; span: number }): number {
    return range.min + this.random() * range.span;
  }

  readTemperature(): number {
    return this.draw(SENSOR_RANGES.temperature);
  }

  readHumidity(): number {
    return this.draw(SENSOR_RANGES.humidity);
  }

  readPressure(): number {
    return this.draw(SENSOR_RANGES.pressure);
  }

  readLocation(): Location {
    return {
      latitude: this.draw(SENSOR_RANGES.latitude),
      longitude: this.draw(SENSOR_RANGES.longitude),
    };
  }

  read(): TelemetryRecord {
    const temperature = this.readTemperature();
    const humidity = this.readHumidity();
    const pressure = this.readPressure();
    const { latitude, longitude } = this.readLocation();
    return { temperature, humidity, pressure, latitude, longitude };
  }
}
