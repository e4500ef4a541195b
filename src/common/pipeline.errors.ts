/**
 * Error taxonomy for the pipeline.
 *
 * - ConfigError and its subclasses are fatal at startup: no pipeline runs.
 * - DecoderError / SinkError are scoped to one unit or one sink and are
 *   recovered locally by the engine.
 * - SourceFatalError ends the run of the input source.
 *
 * Protocol-level errors (framing, checksum, keys) live in
 * `protocol/protocol.errors.ts`.
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PipelineError {}

export class UnknownPluginError extends ConfigError {
  constructor(
    public readonly role: string,
    public readonly pluginName: string,
  ) {
    super(`Unknown ${role} plugin: '${pluginName}'`);
  }
}

export class InvalidOptionError extends ConfigError {
  constructor(
    public readonly pluginName: string,
    public readonly option: string,
    reason: string,
  ) {
    super(`Invalid option '${option}' for plugin '${pluginName}': ${reason}`);
  }
}

export class PluginInitError extends ConfigError {
  constructor(
    public readonly pluginName: string,
    cause: unknown,
  ) {
    super(
      `Plugin '${pluginName}' failed to initialize: ${describeError(cause)}`,
      { cause },
    );
  }
}

export class DecoderError extends PipelineError {
  constructor(
    public readonly decoderName: string,
    cause: unknown,
  ) {
    super(`[${decoderName}] ${describeError(cause)}`, { cause });
  }
}

export class SinkError extends PipelineError {
  constructor(
    public readonly sinkName: string,
    cause: unknown,
  ) {
    super(`[${sinkName}] ${describeError(cause)}`, { cause });
  }
}

export class SourceFatalError extends PipelineError {
  constructor(
    public readonly sourceName: string,
    cause: unknown,
  ) {
    super(`Input '${sourceName}' failed: ${describeError(cause)}`, { cause });
  }
}

/**
 * Format error message from unknown error type
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  // Errors from another realm (vm contexts, test sandboxes) fail instanceof
  if (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  ) {
    return error.message;
  }
  return String(error);
}
