import { DataSource } from 'typeorm';
import { Measurement } from '../../database/entities/measurement.entity';

export type MeasurementRow = Pick<
  Measurement,
  | 'timestamp'
  | 'loggerId'
  | 'loggerType'
  | 'activePowerWatts'
  | 'energyDailyKwh'
  | 'energyTotalKwh'
  | 'status'
  | 'metadata'
>;

/**
 * Persistence seam of the measurement sink.
 */
export interface MeasurementStore {
  open(): Promise<void>;
  /** Insert or update rows by (loggerId, timestamp); returns rows written. */
  upsert(rows: readonly MeasurementRow[]): Promise<number>;
  close(): Promise<void>;
}

export interface PostgresConnectionOptions {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
}

export function createMeasurementDataSource(
  options: PostgresConnectionOptions,
): DataSource {
  return new DataSource({
    type: 'postgres',
    host: options.host,
    port: options.port,
    username: options.username,
    password: options.password,
    database: options.database,
    entities: [Measurement],
    synchronize: options.synchronize,
    logging: false,
  });
}

/**
 * TypeORM-backed store writing to the `measurements` table.
 */
export class TypeOrmMeasurementStore implements MeasurementStore {
  constructor(private readonly dataSource: DataSource) {}

  async open(): Promise<void> {
    if (!this.dataSource.isInitialized) {
      await this.dataSource.initialize();
    }
  }

  async upsert(rows: readonly MeasurementRow[]): Promise<number> {
    if (rows.length === 0) {
      return 0;
    }

    // ON CONFLICT (loggerId, timestamp) DO UPDATE
    await this.dataSource
      .getRepository(Measurement)
      .createQueryBuilder()
      .insert()
      .into(Measurement)
      .values([...rows])
      .orUpdate(
        [
          'loggerType',
          'activePowerWatts',
          'energyDailyKwh',
          'energyTotalKwh',
          'status',
          'metadata',
        ],
        ['loggerId', 'timestamp'],
      )
      .execute();
    return rows.length;
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }
}
