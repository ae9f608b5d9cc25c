/**
 * Tests for the REST API
 */
import request from "supertest";
import { createApp } from "../src/api";
import { ReadingCache } from "../src/readingCache";
import type { EncodedReading, StoredReading } from "../src/readings";
import { InMemoryReadingStore } from "./support/inMemoryReadingStore";

const at = (minute: number) => new Date(Date.UTC(2026, 1, 26, 12, minute));

const reading = (
  deviceId: string,
  sensorKind: EncodedReading["sensorKind"],
  value: number,
  minute: number
): EncodedReading => ({ deviceId, sensorKind, recordedAt: at(minute), value });

const cached = (reading: EncodedReading): StoredReading => ({ ...reading, id: "cached-1" });

const tokenStatus = () => ({ hasToken: false, refreshing: false, expiresAt: undefined, secondsRemaining: 0 });

describe("REST API", () => {
  let store: InMemoryReadingStore;
  let cache: ReadingCache<StoredReading>;
  let app: ReturnType<typeof createApp>;

  beforeEach(async () => {
    store = new InMemoryReadingStore();
    cache = new ReadingCache<StoredReading>();
    app = createApp({ store, cache, tokenStatus });

    await store.insert(reading("dev-1", "temperature", 2000, 0));
    await store.insert(reading("dev-1", "temperature", 2100, 10));
    await store.insert(reading("dev-1", "temperature", 2200, 20));
    await store.insert(reading("dev-1", "relay_state", 1, 20));
    await store.insert(reading("ws-1", "humidity", 5100, 5));
  });

  it("reports health with the token status", async () => {
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "ok",
      token: { hasToken: false, refreshing: false, secondsRemaining: 0 }
    });
  });

  it("serves the OpenAPI document", async () => {
    const res = await request(app).get("/api-docs/openapi.json");

    expect(res.status).toBe(200);
    expect(res.body.openapi).toBe("3.1.0");
    expect(res.body.components.schemas.SensorType.enum).toContain("energy");
    expect(res.body.components.schemas.SensorType["x-units"].energy).toBe("kWh");
  });

  it("lists the latest stored reading per sensor", async () => {
    const res = await request(app).get("/sensors/latest");

    expect(res.status).toBe(200);
    expect(res.body).toEqual([
      {
        id: store.rows[2].id,
        device_id: "dev-1",
        sensor_type: "temperature",
        recorded_at: "2026-02-26T12:20:00.000Z",
        value: 2200
      },
      {
        id: store.rows[3].id,
        device_id: "dev-1",
        sensor_type: "relay_state",
        recorded_at: "2026-02-26T12:20:00.000Z",
        value: 1
      },
      {
        id: store.rows[4].id,
        device_id: "ws-1",
        sensor_type: "humidity",
        recorded_at: "2026-02-26T12:05:00.000Z",
        value: 5100
      }
    ]);
  });

  it("lists the live cache", async () => {
    cache.update(cached(reading("dev-1", "temperature", 2300, 30)));

    const res = await request(app).get("/sensors/live");

    expect(res.body).toEqual([
      {
        id: "cached-1",
        device_id: "dev-1",
        sensor_type: "temperature",
        recorded_at: "2026-02-26T12:30:00.000Z",
        value: 2300
      }
    ]);
  });

  it("returns one sensor oldest first within the range", async () => {
    const res = await request(app)
      .get("/sensors/dev-1/temperature")
      .query({ from: "2026-02-26T12:05:00Z", to: "2026-02-26T12:20:00Z" });

    expect(res.status).toBe(200);
    expect(res.body.map((row: { value: number }) => row.value)).toEqual([2100, 2200]);
  });

  it("returns every reading of a sensor without a range", async () => {
    const res = await request(app).get("/sensors/dev-1/temperature");
    expect(res.body.map((row: { value: number }) => row.value)).toEqual([2000, 2100, 2200]);
  });

  it("rejects an unknown sensor type", async () => {
    const res = await request(app).get("/sensors/dev-1/pressure");

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Invalid path parameters");
  });

  it("rejects a malformed timestamp", async () => {
    const res = await request(app).get("/sensors/dev-1/temperature").query({ from: "yesterday" });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Invalid query parameters");
  });

  it("prefers the cache for the latest reading of one sensor", async () => {
    cache.update(cached(reading("dev-1", "temperature", 2300, 30)));

    const res = await request(app).get("/sensors/dev-1/temperature/latest");

    expect(res.body).toEqual({
      id: "cached-1",
      device_id: "dev-1",
      sensor_type: "temperature",
      recorded_at: "2026-02-26T12:30:00.000Z",
      value: 2300
    });
  });

  it("falls back to the store for the latest reading", async () => {
    const res = await request(app).get("/sensors/dev-1/temperature/latest");

    expect(res.body).toMatchObject({ id: store.rows[2].id, value: 2200 });
  });

  it("answers null when a sensor has no readings", async () => {
    const res = await request(app).get("/sensors/dev-9/humidity/latest");

    expect(res.status).toBe(200);
    expect(res.text).toBe("null");
  });

  it("returns several series in request order", async () => {
    const res = await request(app)
      .post("/sensors/readings")
      .send({
        series: [
          { device_id: "ws-1", sensor_type: "humidity" },
          { device_id: "dev-1", sensor_type: "temperature" },
          { device_id: "dev-9", sensor_type: "energy" }
        ],
        from: "2026-02-26T12:05:00Z"
      });

    expect(res.status).toBe(200);
    expect(
      res.body.map((series: { device_id: string; readings: Array<{ value: number }> }) => [
        series.device_id,
        series.readings.map((row) => row.value)
      ])
    ).toEqual([
      ["ws-1", [5100]],
      ["dev-1", [2100, 2200]],
      ["dev-9", []]
    ]);
  });

  it("rejects an empty series list", async () => {
    const res = await request(app).post("/sensors/readings").send({ series: [] });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Invalid request body");
  });

  it("rejects a body that is not JSON", async () => {
    const res = await request(app).post("/sensors/readings").set("Content-Type", "application/json").send("{");
    expect(res.status).toBe(400);
  });

  it("answers 404 for unknown routes", async () => {
    const res = await request(app).get("/nope");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Not found" });
  });

  it("answers 500 when the store fails", async () => {
    jest.spyOn(store, "latestPerSensor").mockRejectedValue(new Error("connection refused"));

    const res = await request(app).get("/sensors/latest");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "connection refused" });
  });
});
