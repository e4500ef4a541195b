import { Logger } from '@nestjs/common';
import {
  DecoderError,
  SinkError,
  SourceFatalError,
  describeError,
} from '../common/pipeline.errors';
import {
  DecodedUnit,
  Decoder,
  DecodeOutcome,
  InputSource,
  OutputSink,
  PluginLifecycle,
} from '../plugins/interfaces/plugin.interface';
import {
  DEFAULT_STREAM_ID,
  DataUnit,
  DeliveryChannel,
  PipelineRecord,
  UnitOrigin,
} from './pipeline.types';

/**
 * A plugin instance together with the name it was configured under.
 */
export interface Stage<T> {
  readonly name: string;
  readonly instance: T;
}

export interface PipelineStages {
  readonly input: Stage<InputSource>;
  readonly decoders: readonly Stage<Decoder>[];
  readonly outputs: readonly Stage<OutputSink>[];
}

/**
 * Pipeline statistics
 */
export interface PipelineStats {
  unitsReceived: number;
  recordsEmitted: number;
  unitsDropped: number;
  decodeErrors: number;
  sinkErrors: number;
}

/**
 * PipelineEngine - Push-model data flow between stages
 *
 * Responsibilities:
 * 1. Decoder Chain: runs every unit through the decoders in configured order
 * 2. Fan-out: hands each resulting record to every sink in configured order
 * 3. Isolation: a decoder error aborts only its unit, a sink error only that
 *    sink's delivery
 * 4. Ownership: the engine owns every plugin instance and closes them all on
 *    shutdown
 *
 * `deliver` resolves once the unit has gone through every stage. Sources that
 * await it per stream get strict per-stream ordering; distinct streams may
 * interleave, so decoders keep their state keyed by stream id.
 */
export class PipelineEngine implements DeliveryChannel {
  private readonly logger = new Logger(PipelineEngine.name);
  private readonly counters: PipelineStats = {
    unitsReceived: 0,
    recordsEmitted: 0,
    unitsDropped: 0,
    decodeErrors: 0,
    sinkErrors: 0,
  };
  private closed = false;

  constructor(private readonly stages: PipelineStages) {
    if (stages.outputs.length === 0) {
      throw new RangeError('A pipeline needs at least one output');
    }
  }

  get stats(): PipelineStats {
    return { ...this.counters };
  }

  /**
   * Run the input source until it returns or fails.
   *
   * @throws SourceFatalError when the source rejects
   */
  async run(signal: AbortSignal): Promise<void> {
    const { input } = this.stages;
    this.logger.log(
      `Pipeline started: ${input.name} -> [${this.stages.decoders.map((d) => d.name).join(', ')}] -> {${this.stages.outputs.map((o) => o.name).join(', ')}}`,
    );
    try {
      await input.instance.run(this, signal);
    } catch (error) {
      throw error instanceof SourceFatalError
        ? error
        : new SourceFatalError(input.name, error);
    }
    this.logger.log(
      `Input '${input.name}' finished: ${this.counters.unitsReceived} unit(s) in, ${this.counters.recordsEmitted} record(s) out`,
    );
  }

  async deliver(payload: Buffer, origin?: UnitOrigin): Promise<void> {
    this.counters.unitsReceived++;
    const unit: DataUnit = {
      payload,
      origin: origin ?? { streamId: DEFAULT_STREAM_ID },
      receivedAt: new Date(),
    };

    await this.emitRaw(unit);
    await this.process({ unit, fields: {} }, 0);
  }

  endStream(streamId: string): void {
    for (const decoder of this.stages.decoders) {
      decoder.instance.releaseStream?.(streamId);
    }
  }

  /**
   * Close every plugin: input first, then decoders, then outputs. A failing
   * close is logged and does not prevent the others.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const all: Stage<PluginLifecycle>[] = [
      this.stages.input,
      ...this.stages.decoders,
      ...this.stages.outputs,
    ];
    for (const stage of all) {
      try {
        await stage.instance.close?.();
      } catch (error) {
        this.logger.error(
          `Closing '${stage.name}' failed: ${describeError(error)}`,
        );
      }
    }
    this.logger.log(`Pipeline stopped: ${JSON.stringify(this.counters)}`);
  }

  private async process(current: DecodedUnit, index: number): Promise<void> {
    if (index === this.stages.decoders.length) {
      await this.fanOut(current.fields);
      return;
    }

    const decoder = this.stages.decoders[index];
    let outcome: DecodeOutcome;
    try {
      outcome = await decoder.instance.decode(current.unit, current.fields);
    } catch (error) {
      this.counters.decodeErrors++;
      const wrapped = new DecoderError(decoder.name, error);
      this.logger.warn(wrapped.message);
      return;
    }

    if (outcome.response) {
      await this.respond(current.unit, outcome.response);
    }

    switch (outcome.action) {
      case 'forward':
        await this.process(outcome, index + 1);
        return;
      case 'split':
        for (const part of outcome.parts) {
          await this.process(part, index + 1);
        }
        return;
      case 'drop':
        this.counters.unitsDropped++;
        this.logger.debug(`[${decoder.name}] dropped unit: ${outcome.reason}`);
        return;
    }
  }

  private async fanOut(record: PipelineRecord): Promise<void> {
    this.counters.recordsEmitted++;
    for (const output of this.stages.outputs) {
      try {
        await output.instance.emit(record);
      } catch (error) {
        this.counters.sinkErrors++;
        this.logger.error(new SinkError(output.name, error).message);
      }
    }
  }

  private async emitRaw(unit: DataUnit): Promise<void> {
    for (const output of this.stages.outputs) {
      if (!output.instance.emitRaw) continue;
      try {
        await output.instance.emitRaw(unit);
      } catch (error) {
        this.counters.sinkErrors++;
        this.logger.error(new SinkError(output.name, error).message);
      }
    }
  }

  private async respond(unit: DataUnit, response: Buffer): Promise<void> {
    if (!unit.origin.respond) {
      this.logger.debug(
        `Stream ${unit.origin.streamId} cannot carry responses; dropping ${response.length} byte(s)`,
      );
      return;
    }
    try {
      await unit.origin.respond(response);
    } catch (error) {
      this.logger.warn(
        `Response to ${unit.origin.streamId} failed: ${describeError(error)}`,
      );
    }
  }
}
