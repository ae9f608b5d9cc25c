import { z } from "zod";
import { decodePhase, type DeviceStatus, type EnergyMeterStatus, type ThermostatStatus, type WeatherStationStatus } from "./deviceStatus.js";

/**
 * Mirrors the `sensor_type` Postgres enum.
 *
 * Values are stored as integers:
 * - numeric sensors: `round(real_value * 100)`, e.g. 21.45 °C → 2145, 53.13 kWh → 5313
 * - boolean sensors: false → 0, true → 1
 */
export const SENSOR_KINDS = [
  "temperature",
  "humidity",
  "door_open",
  "power_consumption",
  "relay_state",
  "temperature_setpoint",
  "energy"
] as const;

export const sensorKindSchema = z.enum(SENSOR_KINDS);
export type SensorKind = z.infer<typeof sensorKindSchema>;

const BOOLEAN_KINDS: ReadonlySet<SensorKind> = new Set<SensorKind>(["door_open", "relay_state"]);

/** Divisor that turns a stored value back into its real unit; 1 for boolean kinds. */
export const SENSOR_SCALE: Record<SensorKind, number> = {
  temperature: 100,
  humidity: 100,
  door_open: 1,
  power_consumption: 100,
  relay_state: 1,
  temperature_setpoint: 100,
  energy: 100
};

export const SENSOR_UNITS: Record<SensorKind, string> = {
  temperature: "°C",
  humidity: "%",
  door_open: "bool",
  power_consumption: "W",
  relay_state: "bool",
  temperature_setpoint: "°C",
  energy: "kWh"
};

export type EncodedReading = {
  deviceId: string;
  sensorKind: SensorKind;
  /** Time of ingestion, not the vendor's report time. */
  recordedAt: Date;
  value: number;
};

export type StoredReading = EncodedReading & {
  id: string;
};

export const encodeReal = (value: number) => Math.round(value * 100);

export const encodeBool = (value: boolean) => (value ? 1 : 0);

export const isBooleanKind = (kind: SensorKind) => BOOLEAN_KINDS.has(kind);

export const decodeReadingValue = (kind: SensorKind, value: number): number | boolean =>
  isBooleanKind(kind) ? value !== 0 : value / SENSOR_SCALE[kind];

const fromTenths = (raw: number) => encodeReal(raw / 10);
const fromUnits = (raw: number) => encodeReal(raw);

type Pair = [SensorKind, number];
type DevicePairs = { deviceId: string; pairs: Pair[] };

const thermostatPairs = (status: ThermostatStatus): Pair[] => [
  ["relay_state", encodeBool(status.switch)],
  ["temperature", fromTenths(status.temp_current)],
  ["temperature_setpoint", fromTenths(status.temp_set)]
];

const energyMeterPairs = (status: EnergyMeterStatus): Pair[] => {
  const pairs: Pair[] = [
    ["relay_state", encodeBool(status.switch)],
    // Wh → kWh
    ["energy", encodeReal(status.total_forward_energy / 1000)]
  ];
  if (typeof status.temp_current !== "undefined") {
    pairs.push(["temperature", fromUnits(status.temp_current)]);
  }
  const phases = [status.phase_a, status.phase_b, status.phase_c].map(decodePhase);
  if (phases.every((phase) => typeof phase !== "undefined")) {
    const watts = phases.reduce((sum, phase) => sum + (phase?.powerWatts ?? 0), 0);
    pairs.push(["power_consumption", fromUnits(watts)]);
  }
  return pairs;
};

const SUB_SENSORS = [1, 2, 3] as const;

/** Device id under which a weather station's wireless sub-sensor is recorded. */
export const subSensorDeviceId = (deviceId: string, index: 1 | 2 | 3) => `${deviceId}:sub${index}`;

const weatherStationPairs = (deviceId: string, status: WeatherStationStatus): DevicePairs[] => {
  const groups: DevicePairs[] = [
    {
      deviceId,
      pairs: [
        ["temperature", fromTenths(status.local_temp)],
        ["humidity", fromUnits(status.local_hum)]
      ]
    }
  ];

  for (const index of SUB_SENSORS) {
    const temp = status[`sub${index}_temp` as const];
    const hum = status[`sub${index}_hum` as const];
    const pairs: Pair[] = [];
    if (typeof temp !== "undefined") pairs.push(["temperature", fromTenths(temp)]);
    if (typeof hum !== "undefined") pairs.push(["humidity", fromUnits(hum)]);
    if (pairs.length > 0) {
      groups.push({ deviceId: subSensorDeviceId(deviceId, index), pairs });
    }
  }

  return groups;
};

const statusPairs = (deviceId: string, status: DeviceStatus): DevicePairs[] => {
  switch (status.kind) {
    case "thermostat":
      return [{ deviceId, pairs: thermostatPairs(status) }];
    case "energy_meter":
      return [{ deviceId, pairs: energyMeterPairs(status) }];
    case "weather_station":
      return weatherStationPairs(deviceId, status);
  }
};

/**
 * Maps a typed status to encoded readings, all stamped with `recordedAt`.
 * Absent optional fields produce no reading.
 */
export const statusToReadings = (deviceId: string, status: DeviceStatus, recordedAt: Date): EncodedReading[] => {
  const groups = statusPairs(deviceId, status);

  return groups.flatMap((group) =>
    group.pairs.map(([sensorKind, value]) => ({
      deviceId: group.deviceId,
      sensorKind,
      recordedAt,
      value
    }))
  );
};
