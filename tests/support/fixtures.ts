import type { DataPoint, ShadowProperty } from "../../src/tuyaTypes";

export const thermostatPoints = (): DataPoint[] => [
  { code: "switch", value: true },
  { code: "temp_set", value: 220 },
  { code: "temp_current", value: 189 },
  { code: "mode", value: "auto" },
  { code: "child_lock", value: false },
  { code: "fault", value: 0 },
  { code: "upper_temp", value: 60 },
  { code: "temp_correction", value: -22 },
  { code: "frost", value: false },
  { code: "sound", value: true }
];

// Phases: A 230.1 V / 1234 mA / 250 W, B 229.5 V / 512 mA / 100 W, C 228.8 V idle.
export const energyMeterPoints = (): DataPoint[] => [
  { code: "switch", value: true },
  { code: "total_forward_energy", value: 125437 },
  { code: "phase_a", value: "CP0ABNIAAPo=" },
  { code: "phase_b", value: "CPcAAgAAAGQ=" },
  { code: "phase_c", value: "CPAAAAAAAAA=" },
  { code: "fault", value: 0 },
  { code: "switch_prepayment", value: false },
  { code: "energy_reset", value: "" },
  { code: "balance_energy", value: 0 },
  { code: "charge_energy", value: 0 },
  { code: "leakage_current", value: 3 },
  { code: "alarm_set_1", value: "BQEAVQQAAB4=" },
  { code: "alarm_set_2", value: "AQEDIAMBARMEAQCvAgAAFAUAAAA=" },
  { code: "temp_current", value: 16 },
  { code: "countdown_1", value: 0 },
  { code: "reverse_energy_total", value: 12 },
  { code: "cycle_time", value: "AAAA" },
  { code: "random_time", value: "" }
];

const shadow = (code: string, dpId: number, value: number | string, type = "value"): ShadowProperty => ({
  code,
  dp_id: dpId,
  time: 1772132505450,
  type,
  value,
  custom_name: ""
});

export const weatherStationProperties = (): ShadowProperty[] => [
  shadow("local_temp", 131, 208),
  shadow("local_hum", 132, 51),
  shadow("sub1_temp", 133, 218),
  shadow("sub1_hum", 134, 45),
  shadow("sub2_temp", 135, 173),
  shadow("sub2_hum", 136, 49),
  shadow("sub3_temp", 137, -15),
  shadow("sub3_hum", 138, 75),
  shadow("temp_unit_convert", 105, "c", "enum"),
  shadow("backlight", 110, "AQID", "raw")
];

export const envelope = (result: unknown) => ({ success: true, t: 1700000000000, tid: "test-tid", result });
