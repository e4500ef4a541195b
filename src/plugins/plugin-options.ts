import { z } from 'zod';
import {
  PluginDefinition,
  PluginRole,
  RegisteredPlugin,
} from './interfaces/plugin.interface';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);
const FALSY = new Set(['0', 'false', 'no', 'off']);

/**
 * Option schema building blocks. Every option arrives as a string, so each
 * helper parses from string.
 */
export const requiredString = () =>
  z.string({ required_error: 'is required' }).trim().min(1, 'is required');

export const optionalString = () =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined));

export const integerOption = (min: number, max: number) =>
  z
    .string({ required_error: 'is required' })
    .trim()
    .regex(/^-?\d+$/, 'must be an integer')
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));

export const booleanOption = () =>
  z
    .string({ required_error: 'is required' })
    .trim()
    .toLowerCase()
    .refine((value) => TRUTHY.has(value) || FALSY.has(value), {
      message: 'must be a boolean (true/false, yes/no, on/off, 1/0)',
    })
    .transform((value) => TRUTHY.has(value));

export const listOption = () =>
  z.string().transform((value) => splitList(value));

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Bind a plugin definition to the registration table.
 *
 * The returned entry erases the option type: it validates raw string options
 * against the definition's schema and only then calls `create`.
 */
export function definePlugin<R extends PluginRole, O>(
  definition: PluginDefinition<R, O>,
): RegisteredPlugin<R> {
  return {
    role: definition.role,
    name: definition.name,
    description: definition.description,
    defaults: definition.defaults,
    instantiate(options) {
      const parsed = definition.options.safeParse(options);
      if (!parsed.success) {
        return {
          ok: false,
          issues: parsed.error.issues.map((issue) => ({
            option: issue.path.length > 0 ? issue.path.join('.') : '*',
            message: issue.message,
          })),
        };
      }
      return { ok: true, instance: definition.create(parsed.data) };
    },
  };
}
