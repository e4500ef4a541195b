import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import * as ini from 'ini';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, describeError } from '../common/pipeline.errors';
import { PluginSpec } from '../plugins/interfaces/plugin.interface';
import {
  listOption,
  optionalString,
  requiredString,
} from '../plugins/plugin-options';

export const LOG_LEVELS = [
  'debug',
  'info',
  'warning',
  'error',
  'critical',
] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

/**
 * Configuration as sections of string options, e.g.
 * `{ main: { loglevel: 'info' } }`.
 */
export type ConfigSections = Record<string, Record<string, string>>;

/**
 * Everything the runtime needs, resolved once at startup.
 */
export interface PipelineSettings {
  readonly sections: ConfigSections;
  readonly logfile?: string;
  readonly loglevel: LogLevelName;
  /** Log to stderr as well */
  readonly verbose: boolean;
  readonly input: PluginSpec;
  readonly decoders: readonly PluginSpec[];
  readonly outputs: readonly PluginSpec[];
}

export interface ConfigSource {
  /** `.ini` (or any other extension) or `.yaml`/`.yml` */
  configFile?: string;
  /** `section.key=value`, applied in order */
  overrides?: readonly string[];
  verbose?: boolean;
  /** Forces loglevel debug */
  debug?: boolean;
}

const DEFAULT_SECTIONS: ConfigSections = {
  main: { logfile: '', loglevel: 'info' },
  plugins: { input: 'fileread', decode: 'noop', output: 'print' },
};

const RESERVED_SECTIONS = new Set(['main', 'plugins']);

const mainSchema = z.object({
  logfile: optionalString(),
  loglevel: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)),
});

const pluginsSchema = z.object({
  input: requiredString(),
  decode: listOption(),
  output: listOption().refine((names) => names.length > 0, {
    message: 'at least one output plugin is required',
  }),
});

/**
 * Turn parsed INI/YAML into string sections. Top-level scalars belong to
 * `main`; scalar values are stringified and YAML lists joined with commas.
 */
export function normalizeSections(
  parsed: unknown,
  source: string,
): ConfigSections {
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${source}: expected sections of key/value options`);
  }

  const sections: ConfigSections = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (isPlainObject(value)) {
      const section: Record<string, string> = {};
      for (const [key, option] of Object.entries(value)) {
        section[key] = optionText(option, `${source}: [${name}] ${key}`);
      }
      sections[name] = { ...sections[name], ...section };
    } else {
      sections.main = {
        ...sections.main,
        [name]: optionText(value, `${source}: ${name}`),
      };
    }
  }
  return sections;
}

function optionText(value: unknown, where: string): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value) && value.every((item) => !isPlainObject(item))) {
    return value.map((item) => optionText(item, where)).join(',');
  }
  throw new ConfigError(`${where}: nested values are not supported`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse configuration text. YAML for `.yaml`/`.yml`, INI otherwise.
 */
export function parseConfigText(text: string, source: string): ConfigSections {
  const extension = extname(source).toLowerCase();
  let parsed: unknown;
  try {
    parsed =
      extension === '.yaml' || extension === '.yml'
        ? parseYaml(text)
        : ini.parse(text);
  } catch (error) {
    throw new ConfigError(`Cannot parse ${source}: ${describeError(error)}`, {
      cause: error,
    });
  }
  return normalizeSections(parsed, source);
}

export function readConfigFile(path: string): ConfigSections {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${path}: ${describeError(error)}`,
      { cause: error },
    );
  }
  return parseConfigText(text, path);
}

/**
 * Split `section.key=value` at the first `=` and the last `.` of the key.
 * A key without a section goes to `main`.
 */
export function parseOverride(override: string): {
  section: string;
  key: string;
  value: string;
} {
  const equals = override.indexOf('=');
  const path = equals > 0 ? override.slice(0, equals).trim() : '';
  const dot = path.lastIndexOf('.');
  const section = dot >= 0 ? path.slice(0, dot) : 'main';
  const key = path.slice(dot + 1);
  if (!key || !section) {
    throw new ConfigError(
      `Invalid option override '${override}': expected section.key=value`,
    );
  }
  return { section, key, value: override.slice(equals + 1) };
}

export function mergeSections(...layers: ConfigSections[]): ConfigSections {
  const merged: ConfigSections = {};
  for (const layer of layers) {
    for (const [name, options] of Object.entries(layer)) {
      merged[name] = { ...merged[name], ...options };
    }
  }
  return merged;
}

/**
 * Defaults < config file < `-O` overrides, then validate `main` and
 * `plugins` and build one spec per stage.
 *
 * @throws ConfigError for unreadable files, bad overrides or invalid values
 */
export function loadPipelineSettings(
  source: ConfigSource = {},
): PipelineSettings {
  const fromFile = source.configFile ? readConfigFile(source.configFile) : {};
  const fromOverrides: ConfigSections = {};
  for (const override of source.overrides ?? []) {
    const { section, key, value } = parseOverride(override);
    fromOverrides[section] = { ...fromOverrides[section], [key]: value };
  }
  const sections = mergeSections(DEFAULT_SECTIONS, fromFile, fromOverrides);

  const main = validateSection('main', mainSchema, sections.main);
  const plugins = validateSection('plugins', pluginsSchema, sections.plugins);

  const spec = (role: PluginSpec['role'], name: string): PluginSpec => {
    if (RESERVED_SECTIONS.has(name)) {
      throw new ConfigError(`'${name}' is not a valid ${role} plugin name`);
    }
    return { role, name, options: { ...sections[name] } };
  };

  return {
    sections,
    logfile: main.logfile,
    loglevel: source.debug ? 'debug' : main.loglevel,
    verbose: source.verbose ?? false,
    input: spec('input', plugins.input),
    decoders: plugins.decode.map((name) => spec('decode', name)),
    outputs: plugins.output.map((name) => spec('output', name)),
  };
}

function validateSection<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  values: Record<string, string> | undefined,
): T {
  const parsed = schema.safeParse(values ?? {});
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const key = issue.path.join('.');
    throw new ConfigError(
      `Invalid configuration [${name}] ${key}: ${issue.message}`,
    );
  }
  return parsed.data;
}
