import { Command } from 'commander';
import { z } from 'zod';
import { PluginSummary } from '../plugins/plugin-registry.service';

export interface CliOptions {
  config?: string;
  verbose: boolean;
  debug: boolean;
  /** `section.key=value` overrides in command line order */
  overrides: string[];
  listPlugins: boolean;
}

const optionValues = z.object({
  config: z.string().optional(),
  verbose: z.boolean(),
  debug: z.boolean(),
  opt: z.array(z.string()),
  listPlugins: z.boolean(),
});

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(): Command {
  return new Command()
    .name('telemetry-pipe')
    .description('Plugin-based streaming pipeline for inverter telemetry')
    .version('0.1.0')
    .option('-c, --config <file>', 'configuration file (.ini or .yaml)')
    .option('-v, --verbose', 'send logging to stderr as well', false)
    .option('-d, --debug', 'log debug messages (same as -O loglevel=debug)', false)
    .option(
      '-O, --opt <section.key=value>',
      'override a configuration option (repeatable)',
      collect,
      [],
    )
    .option('--list-plugins', 'list the available plugins and exit', false)
    .showHelpAfterError();
}

/**
 * Parse command line arguments (without the node and script entries).
 */
export function parseCliOptions(args: readonly string[]): CliOptions {
  const program = createProgram();
  program.parse([...args], { from: 'user' });
  const values = optionValues.parse(program.opts());
  return {
    config: values.config,
    verbose: values.verbose,
    debug: values.debug,
    overrides: values.opt,
    listPlugins: values.listPlugins,
  };
}

/**
 * One line per plugin: role, name, description in aligned columns.
 */
export function formatPluginList(plugins: readonly PluginSummary[]): string {
  const nameWidth = Math.max(0, ...plugins.map((plugin) => plugin.name.length));
  return plugins
    .map(
      (plugin) =>
        `${plugin.role.padEnd(6)}  ${plugin.name.padEnd(nameWidth)}  ${plugin.description}\n`,
    )
    .join('');
}
