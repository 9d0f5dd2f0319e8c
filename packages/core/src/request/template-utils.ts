/**
 * Utility functions for handling URL templates
 */

import { parseTemplate as urlParseTemplate } from 'url-template';

import { UriResolutionError, describeCause } from '../errors.ts';

import { BASE_URL_TOKEN } from './constants.ts';
import type { SanitizedValue } from './parameter-values.ts';

/**
 * A template interface for expansion
 */
export type TemplateInterface = ReturnType<typeof urlParseTemplate>;

const OPERATORS = new Set(['+', '#', '.', '/', ';', '?', '&']);

// Reserved by RFC 6570 for future extensions.
const RESERVED_OPERATORS = new Set(['=', ',', '!', '@', '|']);

const KEYED_EXPRESSION = /\{([?&;])([^{}]*)\}/g;

const VARSPEC =
  /^(?:[A-Za-z0-9_]|%[0-9A-Fa-f]{2})(?:\.?(?:[A-Za-z0-9_]|%[0-9A-Fa-f]{2}))*(?::[1-9]\d{0,3}|\*)?$/;

/**
 * Parse a URI template string, rejecting templates the expander would
 * silently mangle (unbalanced braces, empty expressions, bad variable names).
 *
 * @param template - Template string with variables like {varName}
 * @returns A template interface for expansion
 */
export function parseTemplate(template: string): TemplateInterface {
  validateTemplate(template);

  // Form-style expressions write their variable names into the URI. The
  // engine percent-encodes those names, so pct-encoded names are expanded
  // under their decoded form and fed the value of the literal name.
  const literals = new Map<string, string>();
  const source = template.replace(
    KEYED_EXPRESSION,
    (_match: string, operator: string, body: string) =>
      `{${operator}${body
        .split(',')
        .map((varspec) => decodeVarspec(template, operator + body, varspec, literals))
        .join(',')}}`,
  );

  const parsed = urlParseTemplate(source);
  if (literals.size === 0) return parsed;

  return {
    expand: (context) => {
      const aliased = { ...context };
      for (const [decoded, literal] of literals) {
        const value = context[literal];
        if (value !== undefined) aliased[decoded] = value;
      }
      return parsed.expand(aliased);
    },
  };
}

/**
 * Expands a parsed template, reporting engine failures as `UriResolutionError`.
 */
export function expandTemplate(
  source: string,
  template: TemplateInterface,
  params: Record<string, SanitizedValue>,
): string {
  try {
    return template.expand(params);
  } catch (error) {
    throw new UriResolutionError(
      `Could not expand URI template "${source}": ${describeCause(error)}`,
      source,
      { cause: error },
    );
  }
}

/**
 * Whether the template starts from a `{+baseurl}` expression, compared
 * case-insensitively.
 */
export function hasBaseUrlToken(template: string): boolean {
  return template.toLowerCase().includes(BASE_URL_TOKEN);
}

/**
 * Merges path and query parameters; query parameters win on key collision.
 */
export function mergeParameters<T>(
  path: Record<string, T>,
  query: Record<string, T>,
): Record<string, T> {
  return { ...path, ...query };
}

function validateTemplate(template: string): void {
  let open = -1;

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];
    if (ch === '{') {
      if (open !== -1) throw malformed(template, `nested "{" at position ${i}`);
      open = i;
    } else if (ch === '}') {
      if (open === -1) throw malformed(template, `unmatched "}" at position ${i}`);
      validateExpression(template, template.slice(open + 1, i));
      open = -1;
    }
  }

  if (open !== -1) throw malformed(template, `unclosed "{" at position ${open}`);
}

function validateExpression(template: string, expression: string): void {
  if (expression.length === 0) {
    throw malformed(template, 'empty expression "{}"');
  }

  const first = expression.charAt(0);
  if (RESERVED_OPERATORS.has(first)) {
    throw malformed(template, `reserved operator "${first}" in "{${expression}}"`);
  }

  const body = OPERATORS.has(first) ? expression.slice(1) : expression;
  for (const varspec of body.split(',')) {
    if (!VARSPEC.test(varspec)) {
      throw malformed(template, `invalid variable "${varspec}" in "{${expression}}"`);
    }
  }
}

function decodeVarspec(
  template: string,
  expression: string,
  varspec: string,
  literals: Map<string, string>,
): string {
  const [, name = '', modifier = ''] = /^([^:*]*)(.*)$/.exec(varspec) ?? [];
  if (!name.includes('%')) return varspec;

  let decoded: string;
  try {
    decoded = decodeURIComponent(name);
  } catch (error) {
    throw new UriResolutionError(
      `Malformed URI template "${template}": variable "${name}" in "{${expression}}" is not valid UTF-8`,
      template,
      { cause: error },
    );
  }

  if (encodeName(decoded) !== name) {
    throw malformed(
      template,
      `variable "${name}" in "{${expression}}" must escape only characters that need escaping, in upper case`,
    );
  }

  if (/[,:*{}]/.test(decoded)) {
    throw malformed(template, `variable "${name}" in "{${expression}}" decodes to template syntax`);
  }

  literals.set(decoded, name);
  return decoded + modifier;
}

// The engine's encoding of names in `?`, `&` and `;` expressions.
function encodeName(name: string): string {
  return encodeURIComponent(name).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

function malformed(template: string, detail: string): UriResolutionError {
  return new UriResolutionError(`Malformed URI template "${template}": ${detail}`, template);
}
