import {
  Entity,
  Column,
  PrimaryColumn,
  Index,
  CreateDateColumn,
} from 'typeorm';

/**
 * Measurement Entity - one decoded inverter reading
 *
 * Headline metrics live in their own columns for time-series queries; every
 * other field of the record goes into the JSONB `metadata` column, so new
 * firmware fields need no migration.
 *
 * Composite Primary Key: [loggerId, timestamp]
 * - One reading per device per timestamp; a retransmitted frame upserts the
 *   same row instead of duplicating it
 */
@Entity('measurements')
@Index('idx_measurements_timestamp', ['timestamp'])
export class Measurement {
  /**
   * Device timestamp of the reading (UTC).
   */
  @PrimaryColumn({ type: 'timestamptz' })
  timestamp!: Date;

  /**
   * Device identifier from the frame header, e.g. "INV00001".
   */
  @PrimaryColumn({ type: 'varchar', length: 64 })
  loggerId!: string;

  /**
   * Source tag configured on the sink (`loggertype` option).
   */
  @Column({ type: 'varchar', length: 20, nullable: false })
  loggerType!: string;

  /** Active AC output in Watts. */
  @Column({ type: 'float', nullable: true })
  activePowerWatts!: number | null;

  /** Energy produced today in kWh. */
  @Column({ type: 'float', nullable: true })
  energyDailyKwh!: number | null;

  /** Lifetime energy counter in kWh. */
  @Column({ type: 'float', nullable: true })
  energyTotalKwh!: number | null;

  /** Operating status label: waiting, normal, fault, standby. */
  @Column({ type: 'varchar', length: 32, nullable: true })
  status!: string | null;

  /**
   * Remaining fields of the record, serialized:
   * {
   *   "sequence": 42,
   *   "pvVoltage1": 380.5,
   *   "acFrequency": 50.01,
   *   "temperature": 41.5
   * }
   */
  @Column({ type: 'jsonb', nullable: true, default: {} })
  metadata!: Record<string, string | number>;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
