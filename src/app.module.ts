import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { pipelineConfig } from './config/pipeline.config';
import { PipelineConfigService } from './config/pipeline-config.service';
import { PipelineSettings } from './config/pipeline-config.loader';
import { PluginsModule } from './plugins/plugins.module';
import { PipelineRunner } from './runtime/pipeline-runner.service';

/**
 * AppModule
 *
 * Application context for one pipeline run: the settings resolved from the
 * command line, the plugin registry and the runner.
 */
@Module({})
export class AppModule {
  static forRoot(settings: PipelineSettings): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [pipelineConfig(settings)],
        }),
        PluginsModule,
      ],
      providers: [PipelineConfigService, PipelineRunner],
      exports: [PipelineRunner],
    };
  }
}
