import type { LogLayer } from 'loglayer';

import { InvalidArgumentError, UriResolutionError } from '../errors.ts';
import { log as defaultLog } from '../log.ts';

import type { RequestDescriptor } from './request-descriptor.ts';

/**
 * Intermediate result containing processed request parts
 */
export interface BuiltRequest {
  /** Resolved request URL */
  url: URL;
  /** Request initialization options */
  init: RequestInit;
}

/**
 * `RequestInit` as accepted by fetch implementations that stream request
 * bodies; they require `duplex: 'half'` for a `ReadableStream` body.
 */
type StreamingRequestInit = RequestInit & { duplex?: 'half' };

/**
 * Builds a standard Request object from a request descriptor.
 *
 * @param descriptor - Configured request descriptor
 * @param app - Application context with logging capabilities
 * @returns Constructed Request object
 */
export function buildRequest(
  descriptor: RequestDescriptor,
  app: { log: LogLayer } = { log: defaultLog },
): Request {
  const { init, url } = buildRequestInit(descriptor, app);
  return new Request(url, init);
}

/**
 * Builds RequestInit and URL objects for a Request from a request descriptor.
 * This is useful when you need more control over the request creation process.
 *
 * Resolution errors from the descriptor propagate unchanged.
 *
 * @throws InvalidArgumentError when a GET or HEAD request carries a body
 */
export function buildRequestInit(
  descriptor: RequestDescriptor,
  app: { log: LogLayer } = { log: defaultLog },
): BuiltRequest {
  const uri = descriptor.getUri();
  const url = toAbsoluteUrl(uri, descriptor.urlTemplate);
  app.log.debug(`Request URL: ${url.toString()}`);

  const method = descriptor.httpMethod ?? 'GET';
  if (descriptor.content !== undefined && (method === 'GET' || method === 'HEAD')) {
    throw new InvalidArgumentError(`A ${method} request cannot have a body.`);
  }

  const init: StreamingRequestInit = {
    method,
    headers: createHeaders(descriptor.getHeaders()),
    body: descriptor.content ?? null,
  };

  if (descriptor.content instanceof ReadableStream) {
    init.duplex = 'half';
  }

  app.log.trace(
    'Request init constructed',
    JSON.stringify({ method: init.method, url: url.toString(), hasBody: init.body !== null }),
  );

  return { init, url };
}

function toAbsoluteUrl(uri: string, template: string): URL {
  try {
    return new URL(uri);
  } catch (error) {
    throw new UriResolutionError(`Resolved URI "${uri}" is not an absolute URL`, template, {
      cause: error,
    });
  }
}

/**
 * Creates headers for the request from the descriptor's header map
 */
function createHeaders(headers: Record<string, string>): Headers {
  const result = new Headers();

  for (const [name, value] of Object.entries(headers)) {
    result.set(name, value);
  }

  return result;
}
