import { SENSOR_KINDS, SENSOR_UNITS } from "./readings.js";

const readingSchemaRef = { $ref: "#/components/schemas/SensorReading" };
const readingList = { type: "array", items: readingSchemaRef };

const sensorPathParams = [
  { name: "device_id", in: "path", required: true, schema: { type: "string" }, description: "Tuya device ID" },
  {
    name: "sensor_type",
    in: "path",
    required: true,
    schema: { $ref: "#/components/schemas/SensorType" },
    description: "Sensor type"
  }
];

const jsonResponse = (description: string, schema: Record<string, unknown>) => ({
  description,
  content: { "application/json": { schema } }
});

export const openApiDocument = {
  openapi: "3.1.0",
  info: {
    title: "Smart Home Backend API",
    version: "0.1.0",
    description: "REST API for smart home sensor data"
  },
  tags: [
    { name: "sensors", description: "Sensor reading endpoints" },
    { name: "system", description: "System endpoints" }
  ],
  paths: {
    "/health": {
      get: {
        tags: ["system"],
        summary: "Service health and token status",
        responses: { "200": { description: "Service is healthy" } }
      }
    },
    "/sensors/latest": {
      get: {
        tags: ["sensors"],
        summary: "Latest stored reading per (device_id, sensor_type)",
        responses: { "200": jsonResponse("Latest readings", readingList) }
      }
    },
    "/sensors/live": {
      get: {
        tags: ["sensors"],
        summary: "In-memory snapshot of the most recently polled readings",
        responses: { "200": jsonResponse("Cached readings", readingList) }
      }
    },
    "/sensors/readings": {
      post: {
        tags: ["sensors"],
        summary: "Time series for several sensors at once",
        requestBody: {
          required: true,
          content: {
            "application/json": {
              schema: {
                type: "object",
                required: ["series"],
                properties: {
                  series: {
                    type: "array",
                    minItems: 1,
                    maxItems: 50,
                    items: {
                      type: "object",
                      required: ["device_id", "sensor_type"],
                      properties: {
                        device_id: { type: "string" },
                        sensor_type: { $ref: "#/components/schemas/SensorType" }
                      }
                    }
                  },
                  from: { type: "string", format: "date-time" },
                  to: { type: "string", format: "date-time" }
                }
              }
            }
          }
        },
        responses: {
          "200": jsonResponse("Readings per requested series", {
            type: "array",
            items: {
              type: "object",
              properties: {
                device_id: { type: "string" },
                sensor_type: { $ref: "#/components/schemas/SensorType" },
                readings: readingList
              }
            }
          }),
          "400": { description: "Invalid request body" }
        }
      }
    },
    "/sensors/{device_id}/{sensor_type}": {
      get: {
        tags: ["sensors"],
        summary: "Readings for one sensor, oldest first",
        parameters: [
          ...sensorPathParams,
          { name: "from", in: "query", schema: { type: "string", format: "date-time" } },
          { name: "to", in: "query", schema: { type: "string", format: "date-time" } }
        ],
        responses: {
          "200": jsonResponse("Sensor readings", readingList),
          "400": { description: "Invalid sensor type or time range" }
        }
      }
    },
    "/sensors/{device_id}/{sensor_type}/latest": {
      get: {
        tags: ["sensors"],
        summary: "Latest reading for one sensor, or null",
        parameters: sensorPathParams,
        responses: {
          "200": jsonResponse("Latest sensor reading", { oneOf: [readingSchemaRef, { type: "null" }] }),
          "400": { description: "Invalid sensor type" }
        }
      }
    }
  },
  components: {
    schemas: {
      SensorType: { type: "string", enum: [...SENSOR_KINDS], "x-units": SENSOR_UNITS },
      SensorReading: {
        type: "object",
        required: ["device_id", "sensor_type", "recorded_at", "value"],
        properties: {
          id: { type: "string", format: "uuid" },
          device_id: { type: "string" },
          sensor_type: { $ref: "#/components/schemas/SensorType" },
          recorded_at: { type: "string", format: "date-time" },
          value: {
            type: "integer",
            format: "int64",
            description: "Numeric sensors: real value × 100 (2145 = 21.45 °C). Boolean sensors: 0 = false, 1 = true."
          }
        }
      }
    }
  }
};
