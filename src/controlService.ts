import type { Logger } from "pino";
import { logger as rootLogger } from "./logger.js";
import type { ReadingCache } from "./readingCache.js";
import { decodeReadingValue, type EncodedReading, type SensorKind, type StoredReading } from "./readings.js";
import type { StopHandle } from "./sensorService.js";
import type { Command } from "./tuyaTypes.js";

export interface CommandSink {
  sendCommands(deviceId: string, commands: Command[]): Promise<boolean>;
}

export type DeviceSnapshot = {
  deviceId: string;
  temperature?: number;
  temperatureSetpoint?: number;
  relayState?: boolean;
};

const numeric = (readings: EncodedReading[], kind: SensorKind) => {
  const reading = readings.find((r) => r.sensorKind === kind);
  if (!reading) return undefined;
  const value = decodeReadingValue(kind, reading.value);
  return typeof value === "number" ? value : undefined;
};

const flag = (readings: EncodedReading[], kind: SensorKind) => {
  const reading = readings.find((r) => r.sensorKind === kind);
  if (!reading) return undefined;
  const value = decodeReadingValue(kind, reading.value);
  return typeof value === "boolean" ? value : undefined;
};

/**
 * Periodic control pass over the cached readings. It only observes for now;
 * `commands` is held for when control decisions are made.
 */
export class ControlService {
  private readonly log: Logger;

  constructor(
    private readonly commands: CommandSink,
    private readonly cache: ReadingCache<StoredReading>,
    options?: { logger?: Logger }
  ) {
    this.log = (options?.logger ?? rootLogger).child({ component: "control" });
  }

  async runOnce(): Promise<DeviceSnapshot[]> {
    const readings = this.cache.all();
    if (readings.length === 0) {
      this.log.info("No sensor readings in cache yet; skipping control iteration");
      return [];
    }

    const byDevice = new Map<string, EncodedReading[]>();
    for (const reading of readings) {
      const list = byDevice.get(reading.deviceId) ?? [];
      list.push(reading);
      byDevice.set(reading.deviceId, list);
    }

    const snapshots: DeviceSnapshot[] = [];
    for (const [deviceId, deviceReadings] of byDevice) {
      const snapshot: DeviceSnapshot = {
        deviceId,
        temperature: numeric(deviceReadings, "temperature"),
        temperatureSetpoint: numeric(deviceReadings, "temperature_setpoint"),
        relayState: flag(deviceReadings, "relay_state")
      };
      this.log.info(snapshot, "Control iteration: latest readings");
      snapshots.push(snapshot);
    }

    return snapshots;
  }

  start(intervalMs: number): StopHandle {
    const tick = () => {
      this.runOnce().catch((err) => {
        this.log.error({ err }, "Control loop iteration failed");
      });
    };

    this.log.info({ intervalMs }, "Control loop started");
    tick();
    const timer = setInterval(tick, intervalMs);

    return {
      stop: () => clearInterval(timer)
    };
  }
}
