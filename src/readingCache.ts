import type { EncodedReading, SensorKind } from "./readings.js";

const copyReading = <R extends EncodedReading>(reading: R): R => ({
  ...reading,
  recordedAt: new Date(reading.recordedAt.getTime())
});

/**
 * Latest reading per `(deviceId, sensorKind)`, shared by the poller, the
 * REST handlers and the control loop.
 *
 * Every method is a synchronous critical section with no I/O, so on the
 * event loop a write never interleaves with a read and `all()` is a
 * point-in-time snapshot. Writes win by arrival order, not by `recordedAt`:
 * a late poll with an older timestamp still overwrites.
 */
export class ReadingCache<R extends EncodedReading = EncodedReading> {
  private readonly byDevice = new Map<string, Map<SensorKind, R>>();

  update(reading: R): void {
    let sensors = this.byDevice.get(reading.deviceId);
    if (!sensors) {
      sensors = new Map();
      this.byDevice.set(reading.deviceId, sensors);
    }
    sensors.set(reading.sensorKind, copyReading(reading));
  }

  get(deviceId: string, sensorKind: SensorKind): R | undefined {
    const reading = this.byDevice.get(deviceId)?.get(sensorKind);
    return reading ? copyReading(reading) : undefined;
  }

  getDevice(deviceId: string): R[] {
    return Array.from(this.byDevice.get(deviceId)?.values() ?? [], (reading) => copyReading(reading));
  }

  all(): R[] {
    const snapshot: R[] = [];
    for (const sensors of this.byDevice.values()) {
      for (const reading of sensors.values()) {
        snapshot.push(copyReading(reading));
      }
    }
    return snapshot;
  }

  get size(): number {
    let count = 0;
    for (const sensors of this.byDevice.values()) {
      count += sensors.size;
    }
    return count;
  }
}
