import { Module } from '@nestjs/common';
import { BUILTIN_PLUGINS } from './builtin-plugins';
import { PLUGIN_DEFINITIONS, PluginRegistry } from './plugin-registry.service';

/**
 * PluginsModule
 *
 * Provides the plugin registry, filled from the built-in registration table.
 */
@Module({
  providers: [
    { provide: PLUGIN_DEFINITIONS, useValue: BUILTIN_PLUGINS },
    PluginRegistry,
  ],
  exports: [PluginRegistry],
})
export class PluginsModule {}
