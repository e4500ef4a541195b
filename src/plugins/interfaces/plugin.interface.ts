import { z } from 'zod';
import {
  DataUnit,
  DeliveryChannel,
  PipelineRecord,
} from '../../pipeline/pipeline.types';

/**
 * Capability roles a plugin may implement.
 */
export type PluginRole = 'input' | 'decode' | 'output';

export const PLUGIN_ROLES: readonly PluginRole[] = ['input', 'decode', 'output'];

/**
 * Raw plugin options as they come out of configuration: string to string.
 */
export type PluginOptions = Readonly<Record<string, string>>;

/**
 * Declarative description of a stage, produced once while resolving
 * configuration and immutable afterwards.
 */
export interface PluginSpec {
  readonly role: PluginRole;
  readonly name: string;
  readonly options: PluginOptions;
}

/**
 * Lifecycle hooks shared by every role.
 *
 * `initialize` runs once after options are bound and is where external
 * resources (files, sockets, capture handles, DB connections) are acquired.
 * `close` releases them and must tolerate a partially initialized instance.
 */
export interface PluginLifecycle {
  initialize?(): Promise<void> | void;
  close?(): Promise<void> | void;
}

/**
 * Input Source: produces raw units and pushes them into the pipeline.
 *
 * `run` resolves when input is exhausted (end of file) or when `signal` is
 * aborted, and rejects on an unrecoverable failure.
 */
export interface InputSource extends PluginLifecycle {
  run(channel: DeliveryChannel, signal: AbortSignal): Promise<void>;
}

/**
 * Unit plus the fields decoded so far.
 */
export interface DecodedUnit {
  readonly unit: DataUnit;
  readonly fields: PipelineRecord;
}

/**
 * Result of one decoder step.
 *
 * - `forward`: continue with one unit
 * - `split`: continue with each part independently (one chunk carrying
 *   several protocol frames)
 * - `drop`: stop here, no sinks invoked
 *
 * Any outcome may carry a `response` that the engine sends back to the
 * unit's origin.
 */
export type DecodeOutcome =
  | (DecodedUnit & { readonly action: 'forward'; readonly response?: Buffer })
  | {
      readonly action: 'split';
      readonly parts: readonly DecodedUnit[];
      readonly response?: Buffer;
    }
  | {
      readonly action: 'drop';
      readonly reason: string;
      readonly response?: Buffer;
    };

/**
 * Decoder: consumes one unit and its context. Throwing aborts the unit only.
 */
export interface Decoder extends PluginLifecycle {
  decode(
    unit: DataUnit,
    fields: PipelineRecord,
  ): DecodeOutcome | Promise<DecodeOutcome>;

  /** Release per-stream state once a stream has ended. */
  releaseStream?(streamId: string): void;
}

/**
 * Output Sink: receives every record that survives the decoder chain.
 */
export interface OutputSink extends PluginLifecycle {
  emit(record: PipelineRecord): Promise<void> | void;

  /** Optional: receives every raw unit before decoding. */
  emitRaw?(unit: DataUnit): Promise<void> | void;
}

export interface PluginInstanceMap {
  input: InputSource;
  decode: Decoder;
  output: OutputSink;
}

export type PluginInstance = PluginInstanceMap[PluginRole];

/**
 * What a plugin author declares. `options` is a zod schema over the merged
 * string options; its output is handed to `create`.
 */
export interface PluginDefinition<R extends PluginRole, O> {
  readonly role: R;
  readonly name: string;
  readonly description: string;
  readonly defaults: PluginOptions;
  readonly options: z.ZodType<O, z.ZodTypeDef, unknown>;
  create(options: O): PluginInstanceMap[R];
}

export interface OptionIssue {
  readonly option: string;
  readonly message: string;
}

export type Instantiation<R extends PluginRole> =
  | { readonly ok: true; readonly instance: PluginInstanceMap[R] }
  | { readonly ok: false; readonly issues: readonly OptionIssue[] };

/**
 * Registration table entry with the option type erased.
 */
export interface RegisteredPlugin<R extends PluginRole = PluginRole> {
  readonly role: R;
  readonly name: string;
  readonly description: string;
  readonly defaults: PluginOptions;
  instantiate(options: PluginOptions): Instantiation<R>;
}
