import { Test, TestingModule } from '@nestjs/testing';
import { z } from 'zod';
import {
  SourceFatalError,
  UnknownPluginError,
} from '../common/pipeline.errors';
import { PipelineConfigService } from '../config/pipeline-config.service';
import { PipelineSettings } from '../config/pipeline-config.loader';
import { PipelineRecord } from '../pipeline/pipeline.types';
import { PluginSpec } from '../plugins/interfaces/plugin.interface';
import { definePlugin, listOption } from '../plugins/plugin-options';
import {
  AnyRegisteredPlugin,
  PLUGIN_DEFINITIONS,
  PluginRegistry,
} from '../plugins/plugin-registry.service';
import {
  EXIT_CONFIG_FAILURE,
  EXIT_SOURCE_FAILURE,
  PipelineRunner,
  exitCodeFor,
} from './pipeline-runner.service';

describe('PipelineRunner', () => {
  const collected: PipelineRecord[] = [];
  const closed: string[] = [];

  const definitions: AnyRegisteredPlugin[] = [
    definePlugin({
      role: 'input',
      name: 'lines',
      description: 'Delivers the configured items',
      defaults: { items: '' },
      options: z.object({ items: listOption() }).strict(),
      create: ({ items }) => ({
        run: async (channel) => {
          for (const item of items) {
            await channel.deliver(Buffer.from(item));
          }
        },
        close: () => {
          closed.push('lines');
        },
      }),
    }),
    definePlugin({
      role: 'input',
      name: 'broken',
      description: 'Fails while running',
      defaults: {},
      options: z.object({}).strict(),
      create: () => ({
        run: () => Promise.reject(new Error('device unplugged')),
        close: () => {
          closed.push('broken');
        },
      }),
    }),
    definePlugin({
      role: 'decode',
      name: 'upper',
      description: 'Upper-cases the payload',
      defaults: {},
      options: z.object({}).strict(),
      create: () => ({
        decode: (unit, fields) => ({
          action: 'forward',
          unit,
          fields: { ...fields, text: unit.payload.toString().toUpperCase() },
        }),
        close: () => {
          closed.push('upper');
        },
      }),
    }),
    definePlugin({
      role: 'output',
      name: 'collect',
      description: 'Collects records',
      defaults: {},
      options: z.object({}).strict(),
      create: () => ({
        emit: (record) => {
          collected.push(record);
        },
        close: () => {
          closed.push('collect');
        },
      }),
    }),
  ];

  function spec(
    role: PluginSpec['role'],
    name: string,
    options: Record<string, string> = {},
  ): PluginSpec {
    return { role, name, options };
  }

  async function createRunner(
    settings: Pick<PipelineSettings, 'input' | 'decoders' | 'outputs'>,
  ): Promise<PipelineRunner> {
    const configService = {
      settings: { ...settings, sections: {}, loglevel: 'info', verbose: false },
      stages: [settings.input, ...settings.decoders, ...settings.outputs],
    };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        { provide: PLUGIN_DEFINITIONS, useValue: definitions },
        { provide: PipelineConfigService, useValue: configService },
        PluginRegistry,
        PipelineRunner,
      ],
    }).compile();

    return module.get<PipelineRunner>(PipelineRunner);
  }

  beforeEach(() => {
    collected.length = 0;
    closed.length = 0;
  });

  it('should run the configured stages to the end of input', async () => {
    const runner = await createRunner({
      input: spec('input', 'lines', { items: 'a,b,c' }),
      decoders: [spec('decode', 'upper')],
      outputs: [spec('output', 'collect')],
    });

    const stats = await runner.run(new AbortController().signal);

    expect(collected.map((record) => record.text)).toEqual(['A', 'B', 'C']);
    expect(stats).toMatchObject({ unitsReceived: 3, recordsEmitted: 3 });
    expect(closed).toEqual(['lines', 'upper', 'collect']);
  });

  it('should close built stages when a later stage is unknown', async () => {
    const runner = await createRunner({
      input: spec('input', 'lines'),
      decoders: [spec('decode', 'upper'), spec('decode', 'missing')],
      outputs: [spec('output', 'collect')],
    });

    await expect(runner.run(new AbortController().signal)).rejects.toThrow(
      UnknownPluginError,
    );
    expect(closed).toEqual(['upper', 'lines']);
  });

  it('should shut down and report a failing input as fatal', async () => {
    const runner = await createRunner({
      input: spec('input', 'broken'),
      decoders: [],
      outputs: [spec('output', 'collect')],
    });

    const running = runner.run(new AbortController().signal);

    await expect(running).rejects.toThrow(SourceFatalError);
    await expect(running).rejects.toThrow(
      "Input 'broken' failed: device unplugged",
    );
    expect(closed).toEqual(['broken', 'collect']);
  });
});

describe('exitCodeFor', () => {
  it('should map errors to exit codes', () => {
    expect(exitCodeFor(new SourceFatalError('socket', 'closed'))).toBe(
      EXIT_SOURCE_FAILURE,
    );
    expect(exitCodeFor(new UnknownPluginError('input', 'x'))).toBe(
      EXIT_CONFIG_FAILURE,
    );
    expect(exitCodeFor(new Error('unexpected'))).toBe(EXIT_CONFIG_FAILURE);
  });
});
