export type HttpMethod =
  | 'GET'
  | 'HEAD'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE'
  | 'OPTIONS'
  | 'TRACE'
  | 'CONNECT';

const HTTP_METHODS: ReadonlySet<string> = new Set<HttpMethod>([
  'GET',
  'HEAD',
  'POST',
  'PUT',
  'PATCH',
  'DELETE',
  'OPTIONS',
  'TRACE',
  'CONNECT',
]);

function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.has(value);
}

export function toHttpMethod(method: string): HttpMethod | undefined {
  const upper = method.toUpperCase().trim();
  return isHttpMethod(upper) ? upper : undefined;
}

export function unreachable(msg: string): never {
  throw new Error(`${msg} is unreachable`);
}

if (import.meta.vitest) {
  const { it, expect } = import.meta.vitest;

  it('normalizes method names', () => {
    expect(toHttpMethod(' patch ')).toBe('PATCH');
    expect(toHttpMethod('Get')).toBe('GET');
  });

  it('rejects unknown methods', () => {
    expect(toHttpMethod('fetch')).toBeUndefined();
  });
}
