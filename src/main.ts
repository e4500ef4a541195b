#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { formatPluginList, parseCliOptions } from './cli/cli-options';
import { describeError } from './common/pipeline.errors';
import {
  PipelineSettings,
  loadPipelineSettings,
} from './config/pipeline-config.loader';
import { PipelineLogger } from './logging/pipeline.logger';
import { PluginRegistry } from './plugins/plugin-registry.service';
import { PluginsModule } from './plugins/plugins.module';
import {
  EXIT_CONFIG_FAILURE,
  EXIT_OK,
  PipelineRunner,
  exitCodeFor,
} from './runtime/pipeline-runner.service';

function reportFatal(error: unknown): void {
  process.stderr.write(`telemetry-pipe: ${describeError(error)}\n`);
}

async function listPlugins(): Promise<number> {
  const app = await NestFactory.createApplicationContext(PluginsModule, {
    logger: false,
  });
  process.stdout.write(formatPluginList(app.get(PluginRegistry).list()));
  await app.close();
  return EXIT_OK;
}

async function runPipeline(
  settings: PipelineSettings,
  logger: PipelineLogger,
): Promise<number> {
  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot(settings),
    { logger, abortOnError: false },
  );

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.log(`Received ${signal}, stopping`, 'Main');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  try {
    await app.get(PipelineRunner).run(controller.signal);
    return EXIT_OK;
  } catch (error) {
    logger.error(describeError(error), 'Main');
    reportFatal(error);
    return exitCodeFor(error);
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    await app.close();
  }
}

async function bootstrap(): Promise<number> {
  const cli = parseCliOptions(process.argv.slice(2));
  if (cli.listPlugins) {
    return listPlugins();
  }

  let settings: PipelineSettings;
  let logger: PipelineLogger;
  try {
    settings = loadPipelineSettings({
      configFile: cli.config,
      overrides: cli.overrides,
      verbose: cli.verbose,
      debug: cli.debug,
    });
    logger = new PipelineLogger({
      level: settings.loglevel,
      logfile: settings.logfile,
      verbose: settings.verbose,
    });
  } catch (error) {
    reportFatal(error);
    return exitCodeFor(error);
  }

  if (!settings.logfile) {
    logger.log('No logfile configured', 'Main');
  }
  try {
    return await runPipeline(settings, logger);
  } finally {
    await logger.close();
  }
}

bootstrap().then(
  (code) => process.exit(code),
  (error: unknown) => {
    reportFatal(error);
    process.exit(EXIT_CONFIG_FAILURE);
  },
);
