export class TuyaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, or a non-2xx HTTP status. */
export class TuyaTransportError extends TuyaError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly details?: unknown
  ) {
    super(message);
  }
}

/** The vendor answered `success: false`. */
export class TuyaApiError extends TuyaError {
  constructor(
    public readonly code: number,
    public readonly msg: string,
    public readonly tid?: string
  ) {
    super(`Tuya API error: code=${code}, msg=${msg}`);
  }
}

/** The vendor answered `success: true` but broke its own contract. */
export class TuyaProtocolError extends TuyaError {}

/** Malformed JSON, an unexpected shape, or a missing required data point. */
export class TuyaDecodeError extends TuyaError {
  constructor(
    message: string,
    public readonly dataPoint?: string,
    public readonly details?: unknown
  ) {
    super(message);
  }
}

export const missingDataPoint = (family: string, code: string) =>
  new TuyaDecodeError(`${family}: missing required data point '${code}'`, code);

export const normalizeTuyaError = (err: unknown) => {
  if (err instanceof TuyaApiError) {
    return { type: err.name, message: err.message, code: err.code, msg: err.msg, tid: err.tid };
  }
  if (err instanceof TuyaTransportError) {
    return { type: err.name, message: err.message, statusCode: err.statusCode, details: err.details };
  }
  if (err instanceof TuyaDecodeError) {
    return { type: err.name, message: err.message, dataPoint: err.dataPoint, details: err.details };
  }
  if (err instanceof Error) {
    return { type: err.name, message: err.message };
  }
  return { type: "Error", message: String(err) };
};
