import { Injectable, Logger } from '@nestjs/common';
import { SourceFatalError, describeError } from '../common/pipeline.errors';
import { PipelineConfigService } from '../config/pipeline-config.service';
import {
  PipelineEngine,
  PipelineStats,
  Stage,
} from '../pipeline/pipeline.engine';
import {
  Decoder,
  OutputSink,
  PluginInstanceMap,
  PluginLifecycle,
  PluginRole,
  PluginSpec,
} from '../plugins/interfaces/plugin.interface';
import { PluginRegistry } from '../plugins/plugin-registry.service';

export const EXIT_OK = 0;
export const EXIT_CONFIG_FAILURE = 1;
export const EXIT_SOURCE_FAILURE = 2;

/**
 * Process exit code for an error that ended the run: 2 when the input failed
 * while running, 1 for everything that stops the pipeline from starting.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof SourceFatalError
    ? EXIT_SOURCE_FAILURE
    : EXIT_CONFIG_FAILURE;
}

/**
 * PipelineRunner - Assembles the configured stages and runs them
 *
 * Stages are resolved in configuration order: input, decoders, outputs. If
 * any of them fails to resolve, the ones already built are closed again
 * before the error propagates. Once running, the engine owns the instances
 * and closes them when the input ends, fails or is aborted.
 */
@Injectable()
export class PipelineRunner {
  private readonly logger = new Logger(PipelineRunner.name);

  constructor(
    private readonly registry: PluginRegistry,
    private readonly config: PipelineConfigService,
  ) {}

  /**
   * @throws ConfigError when a stage cannot be built
   * @throws SourceFatalError when the input fails while running
   */
  async run(signal: AbortSignal): Promise<PipelineStats> {
    const engine = await this.build();
    try {
      await engine.run(signal);
    } finally {
      await engine.shutdown();
    }
    return engine.stats;
  }

  async build(): Promise<PipelineEngine> {
    const { input, decoders, outputs } = this.config.settings;
    this.logger.debug(
      `Building ${this.config.stages.map((spec) => `${spec.role}:${spec.name}`).join(' ')}`,
    );

    const built: Stage<PluginLifecycle>[] = [];
    try {
      const inputStage = await this.resolveStage('input', input, built);
      const decoderStages: Stage<Decoder>[] = [];
      for (const spec of decoders) {
        decoderStages.push(await this.resolveStage('decode', spec, built));
      }
      const outputStages: Stage<OutputSink>[] = [];
      for (const spec of outputs) {
        outputStages.push(await this.resolveStage('output', spec, built));
      }
      return new PipelineEngine({
        input: inputStage,
        decoders: decoderStages,
        outputs: outputStages,
      });
    } catch (error) {
      await this.closeStages(built.reverse());
      throw error;
    }
  }

  private async resolveStage<R extends PluginRole>(
    role: R,
    spec: PluginSpec,
    built: Stage<PluginLifecycle>[],
  ): Promise<Stage<PluginInstanceMap[R]>> {
    const instance = await this.registry.resolve(role, spec.name, spec.options);
    const stage = { name: spec.name, instance };
    built.push(stage);
    return stage;
  }

  private async closeStages(stages: Stage<PluginLifecycle>[]): Promise<void> {
    for (const stage of stages) {
      try {
        await stage.instance.close?.();
      } catch (error) {
        this.logger.warn(
          `Closing '${stage.name}' after a failed start failed: ${describeError(error)}`,
        );
      }
    }
  }
}
