/**
 * Tests for the response envelope decoder and error normalization
 */
import { decodeEnvelope, parseJsonBody } from "../src/tuyaEnvelope";
import {
  normalizeTuyaError,
  TuyaApiError,
  TuyaDecodeError,
  TuyaProtocolError,
  TuyaTransportError
} from "../src/tuyaErrors";
import { commandAckSchema, dataPointSchema, dpValueSchema, tokenResultSchema } from "../src/tuyaTypes";

describe("decodeEnvelope", () => {
  it("returns the typed result on success", () => {
    const json = {
      success: true,
      t: 1545447665981,
      tid: "trace-1",
      result: { access_token: "test-token", expire_time: 7200, refresh_token: "test-refresh", uid: "uid-1" }
    };

    expect(decodeEnvelope(json, tokenResultSchema)).toEqual({
      access_token: "test-token",
      expire_time: 7200,
      refresh_token: "test-refresh",
      uid: "uid-1"
    });
  });

  it("decodes a boolean command acknowledgement", () => {
    expect(decodeEnvelope({ success: true, t: 1, result: true }, commandAckSchema)).toBe(true);
  });

  it("classifies success without a result as a protocol violation", () => {
    expect(() => decodeEnvelope({ success: true, t: 1 }, commandAckSchema)).toThrow(TuyaProtocolError);
    expect(() => decodeEnvelope({ success: true, t: 1, result: null }, commandAckSchema)).toThrow(
      "success=true but result field is missing"
    );
  });

  it("turns success=false into an API error with the vendor code and message", () => {
    const json = { success: false, t: 1561348644346, code: 2009, msg: "not allow to operate", tid: "trace-2" };

    let caught: unknown;
    try {
      decodeEnvelope(json, commandAckSchema);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(TuyaApiError);
    expect(caught).toMatchObject({ code: 2009, msg: "not allow to operate", tid: "trace-2" });
    expect(() => decodeEnvelope(json, commandAckSchema)).toThrow("Tuya API error: code=2009, msg=not allow to operate");
  });

  it("fills in defaults when the failure carries no code or message", () => {
    expect(() => decodeEnvelope({ success: false, t: 1 }, commandAckSchema)).toThrow(
      "Tuya API error: code=-1, msg=(no message)"
    );
  });

  it("rejects an envelope without a success flag", () => {
    expect(() => decodeEnvelope({ t: 1, result: true }, commandAckSchema)).toThrow(TuyaDecodeError);
    expect(() => decodeEnvelope("nope", commandAckSchema)).toThrow("Unexpected response envelope shape");
  });

  it("rejects a result that does not match the payload schema", () => {
    expect(() => decodeEnvelope({ success: true, t: 1, result: "yes" }, commandAckSchema)).toThrow(
      "Unexpected result shape in Tuya response"
    );
  });
});

describe("dpValueSchema", () => {
  it("keeps JSON booleans as booleans", () => {
    expect(dpValueSchema.parse(JSON.parse("true"))).toBe(true);
    expect(dpValueSchema.parse(JSON.parse("false"))).toBe(false);
  });

  it("keeps integers, including negatives, as numbers", () => {
    expect(dpValueSchema.parse(JSON.parse("189"))).toBe(189);
    expect(dpValueSchema.parse(JSON.parse("-22"))).toBe(-22);
  });

  it("keeps strings, including empty ones", () => {
    expect(dpValueSchema.parse(JSON.parse(`"auto"`))).toBe("auto");
    expect(dpValueSchema.parse(JSON.parse(`""`))).toBe("");
  });

  it("does not read 0 and 1 as booleans", () => {
    const points = [
      { code: "fault", value: 0 },
      { code: "switch", value: 1 }
    ].map((point) => dataPointSchema.parse(point));
    expect(points).toEqual([
      { code: "fault", value: 0 },
      { code: "switch", value: 1 }
    ]);
  });

  it("rejects fractional numbers and objects", () => {
    expect(dpValueSchema.safeParse(1.5).success).toBe(false);
    expect(dpValueSchema.safeParse({ a: 1 }).success).toBe(false);
  });
});

describe("parseJsonBody", () => {
  it("raises a decode error for malformed JSON", () => {
    expect(() => parseJsonBody("<html>")).toThrow(TuyaDecodeError);
  });
});

describe("normalizeTuyaError", () => {
  it("keeps the fields of each error class", () => {
    expect(normalizeTuyaError(new TuyaApiError(1010, "token invalid"))).toEqual({
      type: "TuyaApiError",
      message: "Tuya API error: code=1010, msg=token invalid",
      code: 1010,
      msg: "token invalid",
      tid: undefined
    });
    expect(normalizeTuyaError(new TuyaTransportError("boom", 503))).toEqual({
      type: "TuyaTransportError",
      message: "boom",
      statusCode: 503,
      details: undefined
    });
    expect(normalizeTuyaError("plain")).toEqual({ type: "Error", message: "plain" });
  });
});
