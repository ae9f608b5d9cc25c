import { z } from "zod";

/**
 * Device families this service knows how to decode. The family of each
 * device comes from configuration; it selects the endpoint and the builder.
 */
export const DEVICE_TYPES = ["thermostat", "energy_meter", "weather_station"] as const;
export type DeviceType = (typeof DEVICE_TYPES)[number];

// Order matters: boolean is tried before integer so JSON true/false never
// turns into 1/0.
export const dpValueSchema = z.union([z.boolean(), z.number().int(), z.string()]);
export type DpValue = z.infer<typeof dpValueSchema>;

/** A single data point from `GET /v1.0/devices/{id}/status`. */
export const dataPointSchema = z.object({
  code: z.string(),
  value: dpValueSchema
});
export type DataPoint = z.infer<typeof dataPointSchema>;

// Items are validated one at a time so a single odd value does not fail the list.
export const itemListSchema = z.array(z.unknown());

/**
 * A property from `GET /v2.0/cloud/thing/{id}/shadow/properties`.
 * Carries a per-property update time (ms) and the vendor type tag
 * (`value`, `bool`, `enum`, `raw`, `bitmap`).
 */
export const shadowPropertySchema = dataPointSchema.extend({
  dp_id: z.number().int(),
  time: z.number().int(),
  type: z.string(),
  custom_name: z.string().nullish()
});
export type ShadowProperty = z.infer<typeof shadowPropertySchema>;

export const shadowPropertiesResultSchema = z.object({
  properties: itemListSchema
});

export const tokenResultSchema = z.object({
  access_token: z.string().min(1),
  /** Validity in seconds, typically 7200. */
  expire_time: z.number().int().positive(),
  refresh_token: z.string().optional(),
  uid: z.string().optional()
});
export type TokenResult = z.infer<typeof tokenResultSchema>;

export const commandAckSchema = z.boolean();

/**
 * Outer object of every response:
 *
 *   { "success": true,  "t": 1545447665981, "result": <T>, "tid": "..." }
 *   { "success": false, "t": 1561348644346, "code": 2009, "msg": "...", "tid": "..." }
 */
export const envelopeSchema = z.object({
  success: z.boolean(),
  t: z.number().int(),
  tid: z.string().nullish(),
  result: z.unknown().optional(),
  code: z.number().int().nullish(),
  msg: z.string().nullish()
});

export type Command = {
  code: string;
  value: DpValue;
};

export type SignedHeaders = Readonly<{
  client_id: string;
  t: string;
  nonce: string;
  sign_method: "HMAC-SHA256";
  sign: string;
  access_token?: string;
}>;
