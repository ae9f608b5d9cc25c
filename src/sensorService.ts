import type { Logger } from "pino";
import type { DeviceAssignment } from "./config.js";
import type { DeviceStatus } from "./deviceStatus.js";
import { logger as rootLogger } from "./logger.js";
import type { ReadingCache } from "./readingCache.js";
import { statusToReadings, type StoredReading } from "./readings.js";
import type { ReadingStore } from "./readingStore.js";
import { normalizeTuyaError } from "./tuyaErrors.js";
import type { DeviceType } from "./tuyaTypes.js";

export interface DeviceStatusSource {
  fetchDeviceStatus(deviceId: string, deviceType: DeviceType): Promise<DeviceStatus>;
}

export type StopHandle = {
  stop(): void;
};

export class SensorService {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly source: DeviceStatusSource,
    private readonly store: ReadingStore,
    private readonly cache: ReadingCache<StoredReading>,
    options?: { logger?: Logger; now?: () => Date }
  ) {
    this.log = (options?.logger ?? rootLogger).child({ component: "sensor-service" });
    this.now = options?.now ?? (() => new Date());
  }

  /**
   * Fetches one device, persists its readings and refreshes the cache with
   * every row that was actually inserted.
   */
  async pollDevice(deviceId: string, deviceType: DeviceType): Promise<StoredReading[]> {
    this.log.debug({ deviceId, deviceType }, "Fetching sensor readings");

    const status = await this.source.fetchDeviceStatus(deviceId, deviceType);
    const readings = statusToReadings(deviceId, status, this.now());

    const stored: StoredReading[] = [];
    for (const reading of readings) {
      const row = await this.store.insert(reading);
      if (row) {
        this.cache.update(row);
        stored.push(row);
      }
    }

    this.log.info({ deviceId, deviceType, readings: stored.length }, "Sensor readings persisted");
    return stored;
  }

  /** One pass over every device; a failing device is logged and skipped. */
  async pollAll(devices: readonly DeviceAssignment[]) {
    let failures = 0;
    for (const { deviceId, deviceType } of devices) {
      try {
        await this.pollDevice(deviceId, deviceType);
      } catch (err) {
        failures += 1;
        this.log.error({ deviceId, deviceType, error: normalizeTuyaError(err) }, "Failed to fetch sensor readings");
      }
    }
    return { polled: devices.length, failures };
  }

  /**
   * Polls immediately and then every `intervalMs`. A tick that fires while
   * the previous pass is still running is skipped.
   */
  startPolling(devices: readonly DeviceAssignment[], intervalMs: number): StopHandle {
    let running = false;

    const tick = () => {
      if (running) {
        this.log.warn("Previous polling pass still running; skipping tick");
        return;
      }
      running = true;
      this.pollAll(devices)
        .catch((err) => {
          this.log.error({ err }, "Polling pass failed");
        })
        .finally(() => {
          running = false;
        });
    };

    this.log.info({ intervalMs, devices: devices.length }, "Sensor polling loop started");
    tick();
    const timer = setInterval(tick, intervalMs);

    return {
      stop: () => clearInterval(timer)
    };
  }
}
