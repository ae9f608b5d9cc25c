import type { Pool } from "pg";
import type { EncodedReading, SensorKind, StoredReading } from "./readings.js";

export type TimeRange = {
  from?: Date;
  to?: Date;
};

/**
 * Persistence for encoded readings. Inserts are idempotent on
 * `(deviceId, sensorKind, recordedAt)`: a duplicate is ignored and yields null.
 */
export interface ReadingStore {
  insert(reading: EncodedReading): Promise<StoredReading | null>;
  /** Most recent reading per `(deviceId, sensorKind)`. */
  latestPerSensor(): Promise<StoredReading[]>;
  /** Readings for one sensor, oldest first. */
  range(deviceId: string, sensorKind: SensorKind, range?: TimeRange): Promise<StoredReading[]>;
  latest(deviceId: string, sensorKind: SensorKind): Promise<StoredReading | null>;
}

type ReadingRow = {
  id: string;
  device_id: string;
  sensor_type: SensorKind;
  recorded_at: Date;
  // BIGINT comes back from pg as a string
  value: string;
};

const COLUMNS = "id, device_id, sensor_type::text AS sensor_type, recorded_at, value";

const fromRow = (row: ReadingRow): StoredReading => ({
  id: row.id,
  deviceId: row.device_id,
  sensorKind: row.sensor_type,
  recordedAt: row.recorded_at,
  value: Number(row.value)
});

export class PgReadingStore implements ReadingStore {
  constructor(private readonly pool: Pool) {}

  async insert(reading: EncodedReading): Promise<StoredReading | null> {
    const result = await this.pool.query<ReadingRow>(
      `INSERT INTO sensor_readings (device_id, sensor_type, recorded_at, value)
       VALUES ($1, $2::sensor_type, $3, $4)
       ON CONFLICT (device_id, sensor_type, recorded_at) DO NOTHING
       RETURNING ${COLUMNS}`,
      [reading.deviceId, reading.sensorKind, reading.recordedAt, reading.value]
    );
    return result.rows[0] ? fromRow(result.rows[0]) : null;
  }

  async latestPerSensor(): Promise<StoredReading[]> {
    const result = await this.pool.query<ReadingRow>(
      `SELECT DISTINCT ON (device_id, sensor_type) ${COLUMNS}
       FROM sensor_readings
       ORDER BY device_id, sensor_type, recorded_at DESC`
    );
    return result.rows.map(fromRow);
  }

  async range(deviceId: string, sensorKind: SensorKind, range: TimeRange = {}): Promise<StoredReading[]> {
    const result = await this.pool.query<ReadingRow>(
      `SELECT ${COLUMNS}
       FROM sensor_readings
       WHERE device_id = $1
         AND sensor_type = $2::sensor_type
         AND ($3::timestamptz IS NULL OR recorded_at >= $3)
         AND ($4::timestamptz IS NULL OR recorded_at <= $4)
       ORDER BY recorded_at ASC`,
      [deviceId, sensorKind, range.from ?? null, range.to ?? null]
    );
    return result.rows.map(fromRow);
  }

  async latest(deviceId: string, sensorKind: SensorKind): Promise<StoredReading | null> {
    const result = await this.pool.query<ReadingRow>(
      `SELECT ${COLUMNS}
       FROM sensor_readings
       WHERE device_id = $1
         AND sensor_type = $2::sensor_type
       ORDER BY recorded_at DESC
       LIMIT 1`,
      [deviceId, sensorKind]
    );
    return result.rows[0] ? fromRow(result.rows[0]) : null;
  }
}
