import { missingDataPoint } from "./tuyaErrors.js";
import type { DataPoint, DeviceType } from "./tuyaTypes.js";

// ---------------------------------------------------------------------------
// Typed device status
//
// Each family is built from the flat data point list by code lookup rather
// than deserialized directly, so required-field validation stays explicit.
// Raw integers are kept as reported; scaled accessors below convert them.
// ---------------------------------------------------------------------------

/**
 * Thermostat family (v1 status endpoint).
 *
 * `temp_current` and `temp_set` are in tenths of a degree: 189 is 18.9 °C.
 * `temp_correction` is a calibration offset and may be negative.
 */
export type ThermostatStatus = {
  kind: "thermostat";
  switch: boolean;
  temp_current: number;
  temp_set: number;
  mode: string;
  child_lock?: boolean;
  /** Fault bitmask, 0 means no fault. */
  fault?: number;
  upper_temp?: number;
  temp_correction?: number;
  frost?: boolean;
  sound?: boolean;
};

/**
 * Three-phase energy meter (v1 status endpoint).
 *
 * Energies are in Wh, `leakage_current` in mA, `temp_current` in whole °C.
 * `phase_a/b/c` are base64 blobs, see {@link decodePhase}.
 */
export type EnergyMeterStatus = {
  kind: "energy_meter";
  switch: boolean;
  total_forward_energy: number;
  phase_a: string;
  phase_b: string;
  phase_c: string;
  fault?: number;
  switch_prepayment?: boolean;
  balance_energy?: number;
  charge_energy?: number;
  leakage_current?: number;
  reverse_energy_total?: number;
  temp_current?: number;
  countdown_1?: number;
  alarm_set_1?: string;
  alarm_set_2?: string;
  cycle_time?: string;
  random_time?: string;
  energy_reset?: string;
};

/**
 * Weather station with up to three wireless sub-sensors (v2 shadow
 * properties). Temperatures in tenths of a degree, humidity in whole percent.
 */
export type WeatherStationStatus = {
  kind: "weather_station";
  local_temp: number;
  local_hum: number;
  sub1_temp?: number;
  sub1_hum?: number;
  sub2_temp?: number;
  sub2_hum?: number;
  sub3_temp?: number;
  sub3_hum?: number;
  /** `"c"` or `"f"`, from `temp_unit_convert`. */
  temp_unit?: string;
};

export type DeviceStatus = ThermostatStatus | EnergyMeterStatus | WeatherStationStatus;

const asBool = (point: DataPoint | undefined) => (typeof point?.value === "boolean" ? point.value : undefined);
const asInt = (point: DataPoint | undefined) => (typeof point?.value === "number" ? point.value : undefined);
const asText = (point: DataPoint | undefined) => (typeof point?.value === "string" ? point.value : undefined);

const lookup = (points: readonly DataPoint[], family: string) => {
  const find = (code: string) => points.find((point) => point.code === code);

  const required = <T>(code: string, read: (point: DataPoint | undefined) => T | undefined): T => {
    const value = read(find(code));
    if (typeof value === "undefined") {
      throw missingDataPoint(family, code);
    }
    return value;
  };

  return {
    bool: (code: string) => asBool(find(code)),
    int: (code: string) => asInt(find(code)),
    text: (code: string) => asText(find(code)),
    requiredBool: (code: string) => required(code, asBool),
    requiredInt: (code: string) => required(code, asInt),
    requiredText: (code: string) => required(code, asText)
  };
};

// Drops undefined keys so an absent optional field is absent, not present-with-undefined.
const compactObject = <T extends Record<string, unknown>>(value: T) => {
  return Object.fromEntries(Object.entries(value).filter(([, v]) => typeof v !== "undefined")) as T;
};

export const THERMOSTAT_CODES = [
  "switch",
  "temp_current",
  "temp_set",
  "mode",
  "child_lock",
  "fault",
  "upper_temp",
  "temp_correction",
  "frost",
  "sound"
] as const;

export const buildThermostatStatus = (points: readonly DataPoint[]): ThermostatStatus => {
  const dp = lookup(points, "thermostat");
  return compactObject<ThermostatStatus>({
    kind: "thermostat",
    switch: dp.requiredBool("switch"),
    temp_current: dp.requiredInt("temp_current"),
    temp_set: dp.requiredInt("temp_set"),
    mode: dp.requiredText("mode"),
    child_lock: dp.bool("child_lock"),
    fault: dp.int("fault"),
    upper_temp: dp.int("upper_temp"),
    temp_correction: dp.int("temp_correction"),
    frost: dp.bool("frost"),
    sound: dp.bool("sound")
  });
};

export const ENERGY_METER_CODES = [
  "switch",
  "total_forward_energy",
  "phase_a",
  "phase_b",
  "phase_c",
  "fault",
  "switch_prepayment",
  "balance_energy",
  "charge_energy",
  "leakage_current",
  "reverse_energy_total",
  "temp_current",
  "countdown_1",
  "alarm_set_1",
  "alarm_set_2",
  "cycle_time",
  "random_time",
  "energy_reset"
] as const;

export const buildEnergyMeterStatus = (points: readonly DataPoint[]): EnergyMeterStatus => {
  const dp = lookup(points, "energy_meter");
  return compactObject<EnergyMeterStatus>({
    kind: "energy_meter",
    switch: dp.requiredBool("switch"),
    total_forward_energy: dp.requiredInt("total_forward_energy"),
    phase_a: dp.requiredText("phase_a"),
    phase_b: dp.requiredText("phase_b"),
    phase_c: dp.requiredText("phase_c"),
    fault: dp.int("fault"),
    switch_prepayment: dp.bool("switch_prepayment"),
    balance_energy: dp.int("balance_energy"),
    charge_energy: dp.int("charge_energy"),
    leakage_current: dp.int("leakage_current"),
    reverse_energy_total: dp.int("reverse_energy_total"),
    temp_current: dp.int("temp_current"),
    countdown_1: dp.int("countdown_1"),
    alarm_set_1: dp.text("alarm_set_1"),
    alarm_set_2: dp.text("alarm_set_2"),
    cycle_time: dp.text("cycle_time"),
    random_time: dp.text("random_time"),
    energy_reset: dp.text("energy_reset")
  });
};

export const WEATHER_STATION_CODES = [
  "local_temp",
  "local_hum",
  "sub1_temp",
  "sub1_hum",
  "sub2_temp",
  "sub2_hum",
  "sub3_temp",
  "sub3_hum",
  "temp_unit_convert"
] as const;

export const buildWeatherStationStatus = (points: readonly DataPoint[]): WeatherStationStatus => {
  const dp = lookup(points, "weather_station");
  return compactObject<WeatherStationStatus>({
    kind: "weather_station",
    local_temp: dp.requiredInt("local_temp"),
    local_hum: dp.requiredInt("local_hum"),
    sub1_temp: dp.int("sub1_temp"),
    sub1_hum: dp.int("sub1_hum"),
    sub2_temp: dp.int("sub2_temp"),
    sub2_hum: dp.int("sub2_hum"),
    sub3_temp: dp.int("sub3_temp"),
    sub3_hum: dp.int("sub3_hum"),
    temp_unit: dp.text("temp_unit_convert")
  });
};

const KNOWN_CODES: Record<DeviceType, readonly string[]> = {
  thermostat: THERMOSTAT_CODES,
  energy_meter: ENERGY_METER_CODES,
  weather_station: WEATHER_STATION_CODES
};

/** Codes in `points` that the builder for `type` does not map. */
export const unmappedCodes = (type: DeviceType, points: readonly DataPoint[]) => {
  const known = KNOWN_CODES[type];
  return points.map((point) => point.code).filter((code) => !known.includes(code));
};

export const buildDeviceStatus = (type: DeviceType, points: readonly DataPoint[]): DeviceStatus => {
  switch (type) {
    case "thermostat":
      return buildThermostatStatus(points);
    case "energy_meter":
      return buildEnergyMeterStatus(points);
    case "weather_station":
      return buildWeatherStationStatus(points);
  }
};

// --- scaled accessors --------------------------------------------------------

export const tempCurrentCelsius = (status: ThermostatStatus) => status.temp_current / 10;
export const tempSetCelsius = (status: ThermostatStatus) => status.temp_set / 10;

export const localTempCelsius = (status: WeatherStationStatus) => status.local_temp / 10;
export const localHumidityPercent = (status: WeatherStationStatus) => status.local_hum;

export const forwardEnergyKwh = (status: EnergyMeterStatus) => status.total_forward_energy / 1000;

export type PhaseReading = {
  /** Tenths of a volt. */
  voltageDeciVolts: number;
  currentMilliAmps: number;
  powerWatts: number;
};

/**
 * Decodes a phase blob: 8 bytes, big-endian, voltage (2 bytes, 0.1 V),
 * current (3 bytes, mA), active power (3 bytes, W). Returns undefined for
 * anything shorter than 8 bytes.
 */
export const decodePhase = (blob: string): PhaseReading | undefined => {
  const bytes = Buffer.from(blob, "base64");
  if (bytes.length < 8) return undefined;
  return {
    voltageDeciVolts: bytes.readUInt16BE(0),
    currentMilliAmps: bytes.readUIntBE(2, 3),
    powerWatts: bytes.readUIntBE(5, 3)
  };
};
