import { describe, it, expect } from 'vitest';

import { UriResolutionError } from '../errors.ts';

import { expandTemplate, hasBaseUrlToken, mergeParameters, parseTemplate } from './template-utils.ts';
import type { TemplateInterface } from './template-utils.ts';

describe('parseTemplate', () => {
  it('accepts level 4 expressions', () => {
    const template = parseTemplate('{+baseurl}/users{/id}{?q,limit*}{&page}');

    expect(
      template.expand({ baseurl: 'https://api.example.com', id: '7', q: 'a b', limit: [5], page: 2 }),
    ).toBe('https://api.example.com/users/7?q=a%20b&limit=5&page=2');
  });

  it('rejects an unclosed expression', () => {
    expect(() => parseTemplate('/users/{id')).toThrow(
      new UriResolutionError('Malformed URI template "/users/{id": unclosed "{" at position 7', ''),
    );
  });

  it('rejects an unmatched closing brace', () => {
    expect(() => parseTemplate('/a}')).toThrow('unmatched "}" at position 2');
  });

  it('rejects nested expressions', () => {
    expect(() => parseTemplate('/{a{b}}')).toThrow('nested "{" at position 3');
  });

  it('rejects empty expressions', () => {
    expect(() => parseTemplate('/users/{}')).toThrow('empty expression "{}"');
  });

  it('rejects reserved operators', () => {
    expect(() => parseTemplate('/users/{!id}')).toThrow('reserved operator "!" in "{!id}"');
  });

  it('rejects invalid prefix modifiers', () => {
    expect(() => parseTemplate('/users/{id:0}')).toThrow('invalid variable "id:0" in "{id:0}"');
  });

  it('keeps percent-encoded names of form-style expressions as written', () => {
    const template = parseTemplate('/items{;%24x}{?%24top}{&%24skip}');

    expect(template.expand({ '%24x': 'v', '%24top': 10, '%24skip': 5 })).toBe(
      '/items;%24x=v?%24top=10&%24skip=5',
    );
  });

  it('rejects escapes that would not be written back as they appear', () => {
    expect(() => parseTemplate('/items{?%2ftop}')).toThrow(
      'variable "%2ftop" in "{?%2ftop}" must escape only characters that need escaping, in upper case',
    );
    expect(() => parseTemplate('/items{?%41}')).toThrow(UriResolutionError);
  });

  it('rejects escaped names that decode to template syntax', () => {
    expect(() => parseTemplate('/items{?%3Aa}')).toThrow(
      'variable "%3Aa" in "{?%3Aa}" decodes to template syntax',
    );
  });

  it('rejects escaped names that are not UTF-8', () => {
    expect(() => parseTemplate('/items{?%FF}')).toThrow('variable "%FF" in "{?%FF}" is not valid UTF-8');
  });

  it('carries the template on the error', () => {
    let caught: unknown;
    try {
      parseTemplate('/users/{}');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UriResolutionError);
    expect(caught).toHaveProperty('template', '/users/{}');
  });
});

describe('expandTemplate', () => {
  it('wraps engine failures in UriResolutionError', () => {
    const boom = new Error('boom');
    const template: TemplateInterface = {
      expand: () => {
        throw boom;
      },
    };

    let caught: unknown;
    try {
      expandTemplate('/x', template, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UriResolutionError);
    expect(caught).toHaveProperty('message', 'Could not expand URI template "/x": boom');
    expect(caught).toHaveProperty('cause', boom);
  });
});

describe('hasBaseUrlToken', () => {
  it('matches the reserved expansion case-insensitively', () => {
    expect(hasBaseUrlToken('{+BASEURL}/users')).toBe(true);
    expect(hasBaseUrlToken('{+baseurl}/users')).toBe(true);
  });

  it('ignores simple expansion of baseurl', () => {
    expect(hasBaseUrlToken('{baseurl}/users')).toBe(false);
  });
});

describe('mergeParameters', () => {
  it('lets the second map win', () => {
    expect(mergeParameters({ a: 1, b: 2 }, { b: 3 })).toEqual({ a: 1, b: 3 });
  });
});
