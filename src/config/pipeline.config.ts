import { registerAs } from '@nestjs/config';
import { PipelineSettings } from './pipeline-config.loader';

export const PIPELINE_CONFIG = 'pipeline';

/**
 * Config namespace holding the settings resolved from the command line.
 */
export const pipelineConfig = (settings: PipelineSettings) =>
  registerAs(PIPELINE_CONFIG, () => ({ ...settings }));
