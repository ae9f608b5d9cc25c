import type { z } from "zod";
import { TuyaApiError, TuyaDecodeError, TuyaProtocolError } from "./tuyaErrors.js";
import { envelopeSchema } from "./tuyaTypes.js";

export const MISSING_ERROR_CODE = -1;
export const MISSING_ERROR_MSG = "(no message)";

/**
 * Unwraps the response envelope shared by every endpoint and validates the
 * payload against `resultSchema`.
 */
export const decodeEnvelope = <S extends z.ZodTypeAny>(json: unknown, resultSchema: S): z.output<S> => {
  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new TuyaDecodeError("Unexpected response envelope shape", undefined, envelope.error.flatten());
  }

  const { success, result, code, msg, tid } = envelope.data;

  if (!success) {
    throw new TuyaApiError(code ?? MISSING_ERROR_CODE, msg ?? MISSING_ERROR_MSG, tid ?? undefined);
  }

  if (typeof result === "undefined" || result === null) {
    throw new TuyaProtocolError("Tuya response: success=true but result field is missing");
  }

  const payload = resultSchema.safeParse(result);
  if (!payload.success) {
    throw new TuyaDecodeError("Unexpected result shape in Tuya response", undefined, payload.error.flatten());
  }

  return payload.data;
};

export const parseJsonBody = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new TuyaDecodeError(
      `Tuya response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};
