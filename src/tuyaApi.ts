import crypto from "node:crypto";
import type { Logger } from "pino";
import type { z } from "zod";
import { buildDeviceStatus, unmappedCodes, type DeviceStatus } from "./deviceStatus.js";
import { logger as rootLogger } from "./logger.js";
import { noopResponseArchive, type ResponseArchive } from "./responseArchive.js";
import { TuyaTokenManager } from "./tuyaAuth.js";
import { decodeEnvelope, parseJsonBody } from "./tuyaEnvelope.js";
import { TuyaTransportError } from "./tuyaErrors.js";
import { sign, type Credentials } from "./tuyaSigning.js";
import {
  commandAckSchema,
  dataPointSchema,
  itemListSchema,
  shadowPropertiesResultSchema,
  shadowPropertySchema,
  tokenResultSchema,
  type Command,
  type DataPoint,
  type DeviceType,
  type ShadowProperty,
  type TokenResult
} from "./tuyaTypes.js";

export const TOKEN_PATH = "/v1.0/token?grant_type=1";

export const devicePaths = {
  status: (deviceId: string) => `/v1.0/devices/${encodeURIComponent(deviceId)}/status`,
  shadowProperties: (deviceId: string) => `/v2.0/cloud/thing/${encodeURIComponent(deviceId)}/shadow/properties`,
  commands: (deviceId: string) => `/v1.0/devices/${encodeURIComponent(deviceId)}/commands`
};

export type HttpRequest = {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
};

export type HttpResponse = {
  ok: boolean;
  status: number;
  text(): Promise<string>;
};

export type FetchFn = (url: string, init: HttpRequest) => Promise<HttpResponse>;

export type TuyaApiClientOptions = {
  baseUrl: string;
  credentials: Credentials;
  requestTimeoutMs: number;
  fetch?: FetchFn;
  archive?: ResponseArchive;
  now?: () => number;
  nonce?: () => string;
  logger?: Logger;
};

type RequestOptions<S extends z.ZodTypeAny> = {
  /** Sub-directory name for the raw response archive. */
  endpoint: string;
  method: "GET" | "POST";
  path: string;
  schema: S;
  auth: boolean;
  body?: Record<string, unknown>;
  archiveSuffix?: string;
};

const defaultFetch: FetchFn = (url, init) => fetch(url, init);

/**
 * Client for the Tuya cloud API. One instance is shared by every task; it
 * owns the single token manager. No retries happen here: a failed call
 * surfaces to the caller, whose scheduler decides what to do next.
 */
export class TuyaApiClient {
  private readonly baseUrl: string;
  private readonly credentials: Credentials;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly archive: ResponseArchive;
  private readonly now: () => number;
  private readonly nonce: () => string;
  private readonly log: Logger;
  private readonly tokenManager: TuyaTokenManager;

  constructor(options: TuyaApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.credentials = options.credentials;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.archive = options.archive ?? noopResponseArchive;
    this.now = options.now ?? Date.now;
    this.nonce = options.nonce ?? (() => crypto.randomUUID());
    this.log = (options.logger ?? rootLogger).child({ component: "tuya-api" });
    this.tokenManager = new TuyaTokenManager({
      fetchToken: () => this.fetchToken(),
      now: this.now,
      logger: options.logger
    });
  }

  getTokenStatus() {
    return this.tokenManager.getStatus();
  }

  async fetchToken(): Promise<TokenResult> {
    return this.request({
      endpoint: "token",
      method: "GET",
      path: TOKEN_PATH,
      schema: tokenResultSchema,
      auth: false
    });
  }

  /** Data points from the v1 status endpoint. */
  async fetchStatus(deviceId: string): Promise<DataPoint[]> {
    const items = await this.request({
      endpoint: "device_status",
      method: "GET",
      path: devicePaths.status(deviceId),
      schema: itemListSchema,
      auth: true,
      archiveSuffix: deviceId
    });
    return this.keepValid(deviceId, items, dataPointSchema);
  }

  /** Shadow properties, for devices the v1 status endpoint does not support. */
  async fetchShadowProperties(deviceId: string): Promise<ShadowProperty[]> {
    const result = await this.request({
      endpoint: "shadow_properties",
      method: "GET",
      path: devicePaths.shadowProperties(deviceId),
      schema: shadowPropertiesResultSchema,
      auth: true,
      archiveSuffix: deviceId
    });
    return this.keepValid(deviceId, result.properties, shadowPropertySchema);
  }

  async sendCommands(deviceId: string, commands: Command[]): Promise<boolean> {
    return this.request({
      endpoint: "commands",
      method: "POST",
      path: devicePaths.commands(deviceId),
      schema: commandAckSchema,
      auth: true,
      body: { commands },
      archiveSuffix: deviceId
    });
  }

  /**
   * Fetches and decodes a device using the endpoint its family needs.
   * Unmapped codes are logged and ignored.
   */
  async fetchDeviceStatus(deviceId: string, deviceType: DeviceType): Promise<DeviceStatus> {
    const points =
      deviceType === "weather_station" ? await this.fetchShadowProperties(deviceId) : await this.fetchStatus(deviceId);

    const unknown = unmappedCodes(deviceType, points);
    if (unknown.length > 0) {
      this.log.debug({ deviceId, deviceType, codes: unknown }, "Ignoring unmapped data point codes");
    }

    return buildDeviceStatus(deviceType, points);
  }

  /**
   * Drops items whose value is not a boolean, integer or string. A dropped
   * required code then surfaces as a missing data point in the builder.
   */
  private keepValid<S extends z.ZodTypeAny>(deviceId: string, items: unknown[], schema: S): z.output<S>[] {
    const valid: z.output<S>[] = [];
    for (const item of items) {
      const parsed = schema.safeParse(item);
      if (parsed.success) {
        valid.push(parsed.data);
      } else {
        this.log.debug({ deviceId, item }, "Dropping data point with an unsupported value");
      }
    }
    return valid;
  }

  private async request<S extends z.ZodTypeAny>(options: RequestOptions<S>): Promise<z.output<S>> {
    const accessToken = options.auth ? await this.tokenManager.getToken() : undefined;
    const body = options.body ? JSON.stringify(options.body) : "";

    const signed = sign(
      {
        method: options.method,
        pathAndQuery: options.path,
        body,
        accessToken,
        timestamp: String(this.now()),
        nonce: this.nonce()
      },
      this.credentials
    );

    const headers: Record<string, string> = { Accept: "application/json" };
    for (const [name, value] of Object.entries(signed)) {
      if (typeof value === "string") headers[name] = value;
    }
    if (options.body) {
      headers["Content-Type"] = "application/json";
    }

    const url = `${this.baseUrl}${options.path}`;
    this.log.debug({ method: options.method, path: options.path }, "Tuya request");

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs);

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchImpl(url, {
        method: options.method,
        headers,
        body: options.body ? body : undefined,
        signal: controller.signal
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (err) {
      throw new TuyaTransportError(
        `Tuya ${options.method} ${options.path} failed: ${err instanceof Error ? err.message : String(err)}`
      );
    } finally {
      clearTimeout(timeout);
    }

    await this.archiveResponse(options.endpoint, options.archiveSuffix ?? "", text);

    if (!ok) {
      throw new TuyaTransportError(
        `Tuya ${options.method} ${options.path} failed with status ${status}`,
        status,
        text.slice(0, 500)
      );
    }

    return decodeEnvelope(parseJsonBody(text), options.schema);
  }

  private async archiveResponse(endpoint: string, suffix: string, text: string) {
    try {
      await this.archive.save(endpoint, suffix, text);
    } catch (err) {
      this.log.warn({ err, endpoint }, "Response archive failed");
    }
  }
}
