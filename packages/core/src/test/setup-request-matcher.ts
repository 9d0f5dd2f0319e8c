import { expect } from 'vitest';

export interface ExpectedRequest {
  url?: string;
  method?: string;
  headers?: Record<string, string>;
  body?: object | string | null; // JSON-serialisable, raw text, or no body
}

async function compareRequest(received: Request, expected: ExpectedRequest): Promise<void> {
  if (expected.url !== undefined) expect(received.url).toBe(expected.url);

  if (expected.method !== undefined)
    expect(received.method.toLowerCase()).toBe(expected.method.toLowerCase());

  if (expected.headers !== undefined) {
    const actualHeaders = Object.fromEntries(received.headers);
    expect(actualHeaders).toEqual(
      expect.objectContaining(
        Object.fromEntries(Object.entries(expected.headers).map(([k, v]) => [k.toLowerCase(), v])),
      ),
    );
  }

  if (expected.body === null) {
    expect(received.body).toBeNull();
  } else if (expected.body !== undefined) {
    const text = await received.clone().text(); // don’t consume original
    const contentType = received.headers.get('content-type');

    const parsed: unknown = contentType?.includes('json') ? JSON.parse(text) : text;
    expect(parsed).toEqual(expected.body);
  }
}

/* --- Register the matcher with Vitest --------------------------- */
expect.extend({
  async toMatchRequest(received: Request, expected: ExpectedRequest) {
    try {
      await compareRequest(received, expected);
      return {
        pass: true,
        message: () => 'Request matched expected shape',
      };
    } catch (error: unknown) {
      return {
        pass: false,
        message: () => (error instanceof Error ? error.message : String(error)),
      };
    }
  },
});

/* --- Type declarations so TS recognises the matcher ------------- */
declare module 'vitest' {
  // make it awaitable to avoid dangling promises
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  interface Assertion<T> {
    toMatchRequest(expected: ExpectedRequest): Promise<void>;
  }
  interface AsymmetricMatchersContaining {
    toMatchRequest(expected: ExpectedRequest): Promise<void>;
  }
}
