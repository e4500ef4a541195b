/**
 * Scalar value carried by a record field: integer/float, string, timestamp
 * or binary blob.
 */
export type FieldValue = number | string | Date | Buffer;

/**
 * Decoded, named-field output of the decoder chain. Also used as the
 * accumulated context while a unit travels through the chain.
 */
export type PipelineRecord = Readonly<Record<string, FieldValue>>;

/**
 * Where a unit came from. `streamId` partitions per-stream decoder state
 * (e.g. one TCP connection); `respond` sends bytes back to the producer when
 * the transport allows it.
 */
export interface UnitOrigin {
  readonly streamId: string;
  respond?(data: Buffer): void | Promise<void>;
}

/**
 * In-flight payload traveling through the decoder chain.
 */
export interface DataUnit {
  readonly payload: Buffer;
  readonly origin: UnitOrigin;
  readonly receivedAt: Date;
}

/**
 * Handle given to an input source for pushing data into the pipeline.
 *
 * `deliver` resolves once the unit has passed every decoder and sink, so a
 * source that awaits it per stream keeps that stream strictly ordered.
 */
export interface DeliveryChannel {
  deliver(payload: Buffer, origin?: UnitOrigin): Promise<void>;
  endStream(streamId: string): void;
}

export const DEFAULT_STREAM_ID = 'default';
