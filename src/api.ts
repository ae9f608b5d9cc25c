import express, { type NextFunction, type Request, type Response } from "express";
import helmet from "helmet";
import type { Logger } from "pino";
import { pinoHttp } from "pino-http";
import { z } from "zod";
import { logger as rootLogger } from "./logger.js";
import { openApiDocument } from "./openapi.js";
import type { ReadingCache } from "./readingCache.js";
import { sensorKindSchema, type EncodedReading, type StoredReading } from "./readings.js";
import type { ReadingStore } from "./readingStore.js";
import type { TuyaTokenManager } from "./tuyaAuth.js";

export type ApiDependencies = {
  store: ReadingStore;
  cache: ReadingCache<StoredReading>;
  tokenStatus: () => ReturnType<TuyaTokenManager["getStatus"]>;
  logger?: Logger;
};

export type ReadingDto = {
  id?: string;
  device_id: string;
  sensor_type: string;
  recorded_at: string;
  /** Numeric sensors: real value × 100. Boolean sensors: 0 or 1. */
  value: number;
};

export const toReadingDto = (reading: EncodedReading & { id?: string }): ReadingDto => ({
  ...(reading.id ? { id: reading.id } : {}),
  device_id: reading.deviceId,
  sensor_type: reading.sensorKind,
  recorded_at: reading.recordedAt.toISOString(),
  value: reading.value
});

const timestamp = z.string().datetime({ offset: true });

const sensorParamsSchema = z.object({
  deviceId: z.string().min(1),
  sensorType: sensorKindSchema
});

const timeRangeSchema = z.object({
  from: timestamp.optional(),
  to: timestamp.optional()
});

const multiSeriesSchema = timeRangeSchema.extend({
  series: z
    .array(
      z.object({
        device_id: z.string().min(1),
        sensor_type: sensorKindSchema
      })
    )
    .min(1)
    .max(50)
});

const toRange = (range: z.infer<typeof timeRangeSchema>) => ({
  from: range.from ? new Date(range.from) : undefined,
  to: range.to ? new Date(range.to) : undefined
});

class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly details: unknown
  ) {
    super(message);
  }
}

const validate = <S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new RequestValidationError(`Invalid ${what}`, parsed.error.flatten());
  }
  return parsed.data;
};

type Handler = (req: Request, res: Response) => Promise<void>;

const route =
  (handler: Handler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const httpStatusOf = (err: unknown) =>
  typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
    ? err.status
    : undefined;

export const createApp = (deps: ApiDependencies) => {
  const log = (deps.logger ?? rootLogger).child({ component: "api" });
  const app = express();

  app.use(helmet());
  app.use(pinoHttp({ logger: log }));
  app.use(express.json({ limit: "256kb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", token: deps.tokenStatus() });
  });

  app.get("/api-docs/openapi.json", (_req, res) => {
    res.json(openApiDocument);
  });

  app.get(
    "/sensors/latest",
    route(async (_req, res) => {
      const rows = await deps.store.latestPerSensor();
      res.json(rows.map(toReadingDto));
    })
  );

  app.get("/sensors/live", (_req, res) => {
    res.json(deps.cache.all().map(toReadingDto));
  });

  app.post(
    "/sensors/readings",
    route(async (req, res) => {
      const body = validate(multiSeriesSchema, req.body, "request body");
      const range = toRange(body);
      const result: Array<{ device_id: string; sensor_type: string; readings: ReadingDto[] }> = [];
      for (const series of body.series) {
        const rows = await deps.store.range(series.device_id, series.sensor_type, range);
        result.push({
          device_id: series.device_id,
          sensor_type: series.sensor_type,
          readings: rows.map(toReadingDto)
        });
      }
      res.json(result);
    })
  );

  app.get(
    "/sensors/:deviceId/:sensorType",
    route(async (req, res) => {
      const params = validate(sensorParamsSchema, req.params, "path parameters");
      const range = toRange(validate(timeRangeSchema, req.query, "query parameters"));
      const rows = await deps.store.range(params.deviceId, params.sensorType, range);
      res.json(rows.map(toReadingDto));
    })
  );

  app.get(
    "/sensors/:deviceId/:sensorType/latest",
    route(async (req, res) => {
      const params = validate(sensorParamsSchema, req.params, "path parameters");
      const cached = deps.cache.get(params.deviceId, params.sensorType);
      if (cached) {
        res.json(toReadingDto(cached));
        return;
      }
      const row = await deps.store.latest(params.deviceId, params.sensorType);
      res.json(row ? toReadingDto(row) : null);
    })
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RequestValidationError) {
      res.status(400).json({ error: err.message, details: err.details });
      return;
    }

    const status = httpStatusOf(err);
    if (status && status >= 400 && status < 500) {
      res.status(status).json({ error: err instanceof Error ? err.message : "Bad request" });
      return;
    }

    log.error({ err, path: req.path }, "Request failed");
    if (!res.headersSent) {
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  return app;
};
