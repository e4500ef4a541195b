import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  InvalidOptionError,
  PluginInitError,
  UnknownPluginError,
  describeError,
} from '../common/pipeline.errors';
import {
  Instantiation,
  PLUGIN_ROLES,
  PluginInstanceMap,
  PluginOptions,
  PluginRole,
  RegisteredPlugin,
} from './interfaces/plugin.interface';

/**
 * Injection token for the registration table.
 */
export const PLUGIN_DEFINITIONS = Symbol('PLUGIN_DEFINITIONS');

export type AnyRegisteredPlugin =
  | RegisteredPlugin<'input'>
  | RegisteredPlugin<'decode'>
  | RegisteredPlugin<'output'>;

export interface PluginSummary {
  role: PluginRole;
  name: string;
  description: string;
  defaults: PluginOptions;
}

type PluginTables = {
  [R in PluginRole]: Map<string, RegisteredPlugin<R>>;
};

/**
 * PluginRegistry - Maps (role, name) to a plugin and builds instances
 *
 * Responsibilities:
 * 1. Lookup: one table per role, filled once from the registration table
 * 2. Option Binding: plugin defaults merged under configured options, then
 *    validated by the plugin's schema
 * 3. Initialization: runs `initialize` and releases the instance again if it
 *    fails
 *
 * Each resolve builds a fresh instance; nothing is shared between stages.
 */
@Injectable()
export class PluginRegistry {
  private readonly logger = new Logger(PluginRegistry.name);
  private readonly tables: PluginTables = {
    input: new Map(),
    decode: new Map(),
    output: new Map(),
  };

  constructor(
    @Inject(PLUGIN_DEFINITIONS)
    definitions: readonly AnyRegisteredPlugin[],
  ) {
    for (const plugin of definitions) {
      switch (plugin.role) {
        case 'input':
          this.register(this.tables.input, plugin);
          break;
        case 'decode':
          this.register(this.tables.decode, plugin);
          break;
        case 'output':
          this.register(this.tables.output, plugin);
          break;
      }
    }
  }

  has(role: PluginRole, name: string): boolean {
    return this.tables[role].has(name);
  }

  /**
   * Every registered plugin, grouped by role then sorted by name.
   */
  list(): PluginSummary[] {
    return PLUGIN_ROLES.flatMap((role) =>
      [...this.tables[role].values()]
        .map((plugin) => ({
          role,
          name: plugin.name,
          description: plugin.description,
          defaults: plugin.defaults,
        }))
        .sort((a, b) => a.name.localeCompare(b.name)),
    );
  }

  /**
   * Build and initialize a plugin instance.
   *
   * @throws UnknownPluginError when no plugin is registered under (role, name)
   * @throws InvalidOptionError when an option fails validation
   * @throws PluginInitError when construction or `initialize` fails
   */
  async resolve<R extends PluginRole>(
    role: R,
    name: string,
    options: PluginOptions = {},
  ): Promise<PluginInstanceMap[R]> {
    const table: Map<string, RegisteredPlugin<R>> = this.tables[role];
    const plugin = table.get(name);
    if (!plugin) {
      throw new UnknownPluginError(role, name);
    }

    const merged: PluginOptions = { ...plugin.defaults, ...options };
    const instantiation = this.instantiate(plugin, merged);
    if (!instantiation.ok) {
      for (const issue of instantiation.issues.slice(1)) {
        this.logger.warn(
          `Plugin '${name}' option '${issue.option}': ${issue.message}`,
        );
      }
      const [first] = instantiation.issues;
      throw new InvalidOptionError(name, first.option, first.message);
    }

    const { instance } = instantiation;
    try {
      await instance.initialize?.();
    } catch (error) {
      await this.release(name, instance);
      throw new PluginInitError(name, error);
    }

    this.logger.debug(
      `Initialized ${role} plugin '${name}'`,
    );
    return instance;
  }

  private instantiate<R extends PluginRole>(
    plugin: RegisteredPlugin<R>,
    options: PluginOptions,
  ): Instantiation<R> {
    try {
      return plugin.instantiate(options);
    } catch (error) {
      throw new PluginInitError(plugin.name, error);
    }
  }

  private register<R extends PluginRole>(
    table: Map<string, RegisteredPlugin<R>>,
    plugin: RegisteredPlugin<R>,
  ): void {
    if (table.has(plugin.name)) {
      throw new Error(
        `Duplicate ${plugin.role} plugin registration: '${plugin.name}'`,
      );
    }
    table.set(plugin.name, plugin);
  }

  private async release(
    name: string,
    instance: PluginInstanceMap[PluginRole],
  ): Promise<void> {
    try {
      await instance.close?.();
    } catch (error) {
      this.logger.warn(
        `Plugin '${name}' failed to close after a failed start: ${describeError(error)}`,
      );
    }
  }
}
