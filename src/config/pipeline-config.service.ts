import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigError } from '../common/pipeline.errors';
import { PluginSpec } from '../plugins/interfaces/plugin.interface';
import { PIPELINE_CONFIG } from './pipeline.config';
import { PipelineSettings } from './pipeline-config.loader';

/**
 * Typed access to the `pipeline` config namespace.
 */
@Injectable()
export class PipelineConfigService {
  constructor(private readonly configService: ConfigService) {}

  get settings(): PipelineSettings {
    const settings =
      this.configService.get<PipelineSettings>(PIPELINE_CONFIG);
    if (!settings) {
      throw new ConfigError('Pipeline configuration is not loaded');
    }
    return settings;
  }

  /** Input first, then decoders in chain order, then outputs */
  get stages(): PluginSpec[] {
    const { input, decoders, outputs } = this.settings;
    return [input, ...decoders, ...outputs];
  }
}
