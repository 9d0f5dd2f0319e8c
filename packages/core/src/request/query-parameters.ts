import { z } from 'zod';

import { InvalidArgumentError } from '../errors.ts';

import { DateOnly } from './parameter-values.ts';
import type { ParameterValue } from './parameter-values.ts';

/**
 * An options object that knows its own query parameters. Implementations
 * decide the emitted name of each field (its alias, or the field name).
 */
export interface QueryParameterSource {
  toQueryParameterEntries(): Iterable<readonly [string, ParameterValue]>;
}

export type QueryParameterShape = Record<string, z.ZodType<ParameterValue, z.ZodTypeDef, unknown>>;

export type QueryParameterAliases<Shape extends QueryParameterShape> = {
  readonly [Field in Extract<keyof Shape, string>]?: string;
};

/**
 * Defines a query parameter set from a zod shape. The returned factory
 * validates its input and produces a `QueryParameterSource` that emits each
 * field under its alias, when one is declared, or under the field name.
 *
 * @example
 * const listUsers = defineQueryParameters(
 *   { pageSize: z.number().int().optional(), search: z.string().optional() },
 *   { pageSize: 'page_size' },
 * );
 * descriptor.setQueryParameters(listUsers({ pageSize: 10 }));
 */
export function defineQueryParameters<Shape extends QueryParameterShape>(
  shape: Shape,
  aliases: QueryParameterAliases<Shape> = {},
): (input: z.input<z.ZodObject<Shape>>) => QueryParameterSource {
  const schema = z.object(shape).strict();

  const names = new Map<string, string>();
  for (const [field, alias] of Object.entries(aliases)) {
    if (typeof alias === 'string') names.set(field, alias);
  }

  return (input) => {
    const result = schema.safeParse(input);
    if (!result.success) {
      throw new InvalidArgumentError(`Invalid query parameters: ${formatIssues(result.error)}`, {
        cause: result.error,
      });
    }

    const entries: (readonly [string, ParameterValue])[] = [];
    for (const [field, value] of Object.entries(result.data)) {
      if (!isParameterValue(value)) {
        throw new InvalidArgumentError(`Query parameter "${field}" has an unsupported value.`);
      }
      entries.push([names.get(field) ?? field, value]);
    }

    return { toQueryParameterEntries: () => entries };
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function isPrimitive(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isParameterValue(value: unknown): value is ParameterValue {
  if (value === undefined || value === null || isPrimitive(value)) return true;
  if (value instanceof Date || value instanceof DateOnly) return true;
  return Array.isArray(value) && value.every(isPrimitive);
}
