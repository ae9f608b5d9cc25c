import dotenv from "dotenv";
import { z } from "zod";
import { DEVICE_TYPES, type DeviceType } from "./tuyaTypes.js";

const emptyToUndefined = (value: unknown) => {
  if (typeof value === "string" && value.trim().length === 0) return undefined;
  return value;
};

const schema = z.object({
  DATABASE_URL: z.string().min(1),

  TUYA_CLIENT_ID: z.string().min(1),
  TUYA_CLIENT_SECRET: z.string().min(1),
  TUYA_BASE_URL: z.string().url(),
  TUYA_DEVICE_IDS: z.string().default(""),
  TUYA_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  SERVER_HOST: z.string().default("0.0.0.0"),
  SERVER_PORT: z.coerce.number().int().positive().max(65535).default(8080),

  POLL_INTERVAL_SECS: z.coerce.number().int().positive().default(60),
  CONTROL_INTERVAL_SECS: z.coerce.number().int().positive().default(60),

  RESPONSE_ARCHIVE_DIR: z.string().default("responses"),

  LOG_LEVEL: z.string().default("info"),
  LOG_FILE: z.preprocess(emptyToUndefined, z.string().optional())
});

export type DeviceAssignment = {
  deviceId: string;
  deviceType: DeviceType;
};

export type AppConfig = {
  databaseUrl: string;

  tuyaClientId: string;
  tuyaClientSecret: string;
  tuyaBaseUrl: string;
  requestTimeoutMs: number;
  devices: DeviceAssignment[];

  serverHost: string;
  serverPort: number;

  pollIntervalMs: number;
  controlIntervalMs: number;

  /** Directory for raw vendor responses; undefined disables archiving. */
  responseArchiveDir: string | undefined;

  logLevel: string;
  logFile: string | undefined;
};

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly fieldErrors: Record<string, string[] | undefined> = {}
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const isDeviceType = (value: string): value is DeviceType =>
  (DEVICE_TYPES as readonly string[]).includes(value);

const parseEntries = (raw: string): DeviceAssignment[] =>
  raw
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const separator = entry.indexOf(":");
      if (separator < 0) {
        throw new ConfigError(`TUYA_DEVICE_IDS entry must be 'device_id:device_type', got: "${entry}"`);
      }
      const deviceId = entry.slice(0, separator).trim();
      const kind = entry.slice(separator + 1).trim();
      if (!deviceId) {
        throw new ConfigError(`TUYA_DEVICE_IDS entry has an empty device id: "${entry}"`);
      }
      if (!isDeviceType(kind)) {
        throw new ConfigError(`unknown device type "${kind}" in TUYA_DEVICE_IDS entry "${entry}"`);
      }
      return { deviceId, deviceType: kind };
    });

/**
 * Parses `"id1:type1,id2:type2"` into device assignments.
 * Blank entries are skipped; a malformed entry or unknown type fails the whole list.
 * A repeated device id keeps its first position and takes the last type given.
 */
export const parseDeviceIds = (raw: string): DeviceAssignment[] => {
  const byId = new Map<string, DeviceType>();
  for (const { deviceId, deviceType } of parseEntries(raw)) {
    byId.set(deviceId, deviceType);
  }
  return Array.from(byId, ([deviceId, deviceType]) => ({ deviceId, deviceType }));
};

export const parseConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError("Invalid configuration", parsed.error.flatten().fieldErrors);
  }

  const values = parsed.data;
  const archiveDir = values.RESPONSE_ARCHIVE_DIR.trim();

  return {
    databaseUrl: values.DATABASE_URL,

    tuyaClientId: values.TUYA_CLIENT_ID,
    tuyaClientSecret: values.TUYA_CLIENT_SECRET,
    tuyaBaseUrl: values.TUYA_BASE_URL.replace(/\/$/, ""),
    requestTimeoutMs: values.TUYA_REQUEST_TIMEOUT_MS,
    devices: parseDeviceIds(values.TUYA_DEVICE_IDS),

    serverHost: values.SERVER_HOST,
    serverPort: values.SERVER_PORT,

    pollIntervalMs: values.POLL_INTERVAL_SECS * 1000,
    controlIntervalMs: values.CONTROL_INTERVAL_SECS * 1000,

    responseArchiveDir: archiveDir.length > 0 ? archiveDir : undefined,

    logLevel: values.LOG_LEVEL,
    logFile: values.LOG_FILE?.trim() || undefined
  };
};

export const loadConfig = (): AppConfig => {
  dotenv.config();
  return parseConfig(process.env);
};
