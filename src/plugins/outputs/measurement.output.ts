import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { PipelineRecord } from '../../pipeline/pipeline.types';
import { serializeValue } from '../../pipeline/record-serializer';
import { OutputSink } from '../interfaces/plugin.interface';
import {
  booleanOption,
  definePlugin,
  integerOption,
  requiredString,
} from '../plugin-options';
import {
  MeasurementRow,
  MeasurementStore,
  TypeOrmMeasurementStore,
  createMeasurementDataSource,
} from './measurement.store';

/** Record fields that map onto dedicated columns. */
const COLUMN_FIELDS = new Set([
  'deviceId',
  'timestamp',
  'activePower',
  'energyToday',
  'energyTotal',
  'status',
]);

/**
 * Map a decoded telemetry record onto a measurements row.
 *
 * @throws TypeError when the record lacks a device id or timestamp
 */
export function toMeasurementRow(
  record: PipelineRecord,
  loggerType: string,
): MeasurementRow {
  const { deviceId, timestamp } = record;
  if (typeof deviceId !== 'string' || !deviceId) {
    throw new TypeError('Record has no deviceId');
  }
  if (!(timestamp instanceof Date) || Number.isNaN(timestamp.getTime())) {
    throw new TypeError(`Record from ${deviceId} has no valid timestamp`);
  }

  const metadata: Record<string, string | number> = {};
  for (const [name, value] of Object.entries(record)) {
    if (!COLUMN_FIELDS.has(name)) {
      metadata[name] = serializeValue(value);
    }
  }

  return {
    timestamp,
    loggerId: deviceId,
    loggerType,
    activePowerWatts: numberOrNull(record.activePower),
    energyDailyKwh: numberOrNull(record.energyToday),
    energyTotalKwh: numberOrNull(record.energyTotal),
    status: typeof record.status === 'string' ? record.status : null,
    metadata,
  };
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * MeasurementOutput - Upserts telemetry records into PostgreSQL
 *
 * Rows are buffered up to `batchSize` and flushed in one statement; the last
 * partial batch is flushed on close. A failed flush keeps its rows.
 */
export class MeasurementOutput implements OutputSink {
  private readonly logger = new Logger(MeasurementOutput.name);
  private pending: MeasurementRow[] = [];
  private written = 0;

  constructor(
    private readonly store: MeasurementStore,
    private readonly loggerType: string,
    private readonly batchSize: number,
  ) {}

  async initialize(): Promise<void> {
    await this.store.open();
    this.logger.log('Connected to measurement store');
  }

  async emit(record: PipelineRecord): Promise<void> {
    this.pending.push(toMeasurementRow(record, this.loggerType));
    if (this.pending.length >= this.batchSize) {
      await this.flush();
    }
  }

  async close(): Promise<void> {
    try {
      await this.flush();
    } finally {
      await this.store.close();
      this.logger.log(`Upserted ${this.written} measurement(s)`);
    }
  }

  private async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }
    // Rows stay pending until the statement succeeds; a failed batch is
    // retried with the next flush
    const count = this.pending.length;
    this.written += await this.store.upsert(this.pending.slice(0, count));
    this.pending.splice(0, count);
  }
}

const measurementOptions = z
  .object({
    host: requiredString(),
    port: integerOption(1, 65535),
    username: requiredString(),
    password: z.string(),
    database: requiredString(),
    loggertype: requiredString().max(20, 'must be at most 20 characters'),
    synchronize: booleanOption(),
    batchsize: integerOption(1, 10000),
  })
  .strict();

export const measurementOutputPlugin = definePlugin({
  role: 'output',
  name: 'measurement',
  description: 'Upsert telemetry records into the PostgreSQL measurements table',
  defaults: {
    host: 'localhost',
    port: '5432',
    username: 'postgres',
    password: '',
    database: 'telemetry',
    loggertype: 'inverter',
    synchronize: 'false',
    batchsize: '1',
  },
  options: measurementOptions,
  create: (options) =>
    new MeasurementOutput(
      new TypeOrmMeasurementStore(createMeasurementDataSource(options)),
      options.loggertype,
      options.batchsize,
    ),
});
