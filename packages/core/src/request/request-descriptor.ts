import type { LogLayer } from 'loglayer';

import { InvalidArgumentError, SerializationError } from '../errors.ts';
import { log as defaultLog } from '../log.ts';
import type {
  Parsable,
  PrimitiveSerializable,
  SerializationWriter,
  SerializationWriterFactory,
} from '../serialization/serialization-writer.ts';
import { toHttpMethod, unreachable } from '../utils.ts';
import type { HttpMethod } from '../utils.ts';

import { BASE_URL_KEY, BINARY_CONTENT_TYPE, CONTENT_TYPE_HEADER, RAW_URL_KEY } from './constants.ts';
import { isEmptyQueryValue, sanitizeParameters } from './parameter-values.ts';
import type { ParameterMap } from './parameter-values.ts';
import type { QueryParameterSource } from './query-parameters.ts';
import type { RequestOption } from './request-options.ts';
import { expandTemplate, hasBaseUrlToken, mergeParameters, parseTemplate } from './template-utils.ts';

export type RequestBody = Uint8Array | ReadableStream<Uint8Array>;

export interface RequestDescriptorOptions {
  urlTemplate?: string;
  httpMethod?: HttpMethod;
  pathParameters?: ParameterMap;
  /** Application context with logging */
  app?: { log: LogLayer };
}

/**
 * The mutable description of one outgoing request, between an API client
 * method and the transport.
 *
 * The final URI comes either from an explicit override (`setUri`, or the
 * `request-raw-url` path parameter) or from expanding `urlTemplate` against
 * the path and query parameters. Once an override is set the descriptor
 * never goes back to template expansion.
 */
export class RequestDescriptor {
  urlTemplate: string;
  httpMethod: HttpMethod | undefined;
  pathParameters: ParameterMap;
  queryParameters: ParameterMap = {};
  content: RequestBody | undefined;

  #uri: string | undefined;
  #headers: Record<string, string> = {};
  readonly #options = new Map<string, RequestOption>();
  readonly #app: { log: LogLayer };

  constructor({
    urlTemplate = '',
    httpMethod,
    pathParameters = {},
    app = { log: defaultLog },
  }: RequestDescriptorOptions = {}) {
    this.urlTemplate = urlTemplate;
    this.httpMethod = httpMethod;
    this.pathParameters = { ...pathParameters };
    this.#app = app;
  }

  get #log(): LogLayer {
    return this.#app.log;
  }

  setHttpMethod(method: string): void {
    const httpMethod = toHttpMethod(method);
    if (!httpMethod) {
      throw new InvalidArgumentError(`Unsupported HTTP method: ${method}`);
    }
    this.httpMethod = httpMethod;
  }

  /**
   * Sets the final URI, bypassing template expansion. Clears the path and
   * query parameters.
   */
  setUri(uri: string): void {
    if (!uri) {
      throw new InvalidArgumentError('uri cannot be empty.');
    }
    this.#uri = uri;
    this.pathParameters = {};
    this.queryParameters = {};
  }

  /**
   * Resolves the URI of the request.
   *
   * @throws InvalidArgumentError when the template needs `baseurl` and it is missing
   * @throws UriResolutionError when the template is malformed or cannot be expanded
   */
  getUri(): string {
    if (this.#uri !== undefined) {
      return this.#uri;
    }

    const raw = this.pathParameters[RAW_URL_KEY];
    if (typeof raw === 'string') {
      this.#log.debug(`Using the "${RAW_URL_KEY}" path parameter as the request URI`);
      this.setUri(raw);
      return raw;
    }

    const template = parseTemplate(this.urlTemplate);
    const baseUrl = this.pathParameters[BASE_URL_KEY];
    if (hasBaseUrlToken(this.urlTemplate) && (baseUrl === undefined || baseUrl === null)) {
      throw new InvalidArgumentError(
        `pathParameters must contain a value for "${BASE_URL_KEY}" for the url to be built.`,
      );
    }

    const params = mergeParameters(
      sanitizeParameters(this.pathParameters),
      sanitizeParameters(this.queryParameters),
    );
    this.#log.trace('Template parameters:', JSON.stringify(params));

    const uri = expandTemplate(this.urlTemplate, template, params);
    this.#log.debug(`Expanded ${this.urlTemplate} to ${uri}`);
    return uri;
  }

  /**
   * Request options keyed by kind. At most one option of each kind is held.
   */
  getRequestOptions(): ReadonlyMap<string, RequestOption> {
    return this.#options;
  }

  getRequestOption(kind: string): RequestOption | undefined {
    return this.#options.get(kind);
  }

  addRequestOptions(...options: RequestOption[]): void {
    for (const option of options) {
      this.#options.set(option.kind, option);
    }
  }

  removeRequestOptions(...options: RequestOption[]): void {
    for (const option of options) {
      this.#options.delete(option.kind);
    }
  }

  /**
   * Sets the body to a binary payload with `Content-Type: application/octet-stream`.
   */
  setStreamContent(body: RequestBody): void {
    this.content = body;
    this.#headers[CONTENT_TYPE_HEADER] = BINARY_CONTENT_TYPE;
    this.#log.trace('Request body set to a binary payload');
  }

  /**
   * Serializes one model, or a collection of models, as the request body.
   *
   * @throws InvalidArgumentError when `values` is empty
   * @throws SerializationError wrapping any writer failure
   */
  setContentFromValues(
    factory: SerializationWriterFactory,
    contentType: string,
    values: readonly Parsable[],
  ): void {
    const [first, ...rest] = values;
    if (first === undefined) {
      throw new InvalidArgumentError('values cannot be empty.');
    }

    this.#serialize(factory, contentType, (writer) => {
      if (rest.length === 0) {
        writer.writeObject(null, first);
      } else {
        writer.writeObjectCollection(null, values);
      }
    });
  }

  /**
   * Serializes a single scalar as the request body, e.g. a `text/plain` payload.
   */
  setContentFromScalar(
    factory: SerializationWriterFactory,
    contentType: string,
    value: PrimitiveSerializable,
  ): void {
    this.#serialize(factory, contentType, (writer) => {
      switch (typeof value) {
        case 'string':
          writer.writeStringValue(null, value);
          break;
        case 'number':
          writer.writeNumberValue(null, value);
          break;
        case 'boolean':
          writer.writeBooleanValue(null, value);
          break;
        default:
          unreachable(`Writing a ${typeof value} scalar`);
      }
    });
  }

  /**
   * Copies the non-empty entries of an options object into the query
   * parameters. `undefined`, `null`, `''` and `[]` are skipped; `0` and
   * `false` are kept.
   */
  setQueryParameters(source: QueryParameterSource | null | undefined): void {
    if (!source) return;

    for (const [name, value] of source.toQueryParameterEntries()) {
      if (isEmptyQueryValue(value)) continue;
      this.queryParameters[name] = value;
    }
  }

  setPathParameters(parameters: ParameterMap): void {
    this.pathParameters = { ...parameters };
  }

  /**
   * Merges headers into the existing ones; later values win per key.
   */
  setHeaders(headers: Record<string, string>): void {
    this.#headers = { ...this.#headers, ...headers };
  }

  getHeaders(): Record<string, string> {
    return { ...this.#headers };
  }

  addHeader(name: string, value: string): void {
    this.#headers[name] = value;
  }

  removeHeader(name: string): void {
    delete this.#headers[name];
  }

  #serialize(
    factory: SerializationWriterFactory,
    contentType: string,
    write: (writer: SerializationWriter) => void,
  ): void {
    let content: Uint8Array;
    try {
      const writer = factory.getWriter(contentType);
      write(writer);
      content = writer.getSerializedContent();
    } catch (error) {
      this.#log.withError(error).error(`Could not serialize the request body as ${contentType}`);
      throw new SerializationError(contentType, error);
    }

    this.#headers[CONTENT_TYPE_HEADER] = contentType;
    this.content = content;
    this.#log.trace(`Request body serialized as ${contentType} (${content.byteLength} bytes)`);
  }
}
