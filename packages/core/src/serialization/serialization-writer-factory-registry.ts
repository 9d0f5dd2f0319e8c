import { JsonSerializationWriterFactory } from './json-serialization-writer.ts';
import { normalizeContentType, stripVendorPrefix } from './serialization-writer.ts';
import type {
  ContentTypeWriterFactory,
  SerializationWriter,
  SerializationWriterFactory,
} from './serialization-writer.ts';
import { TextSerializationWriterFactory } from './text-serialization-writer.ts';

/**
 * Routes `getWriter` to the factory registered for the content type. Lookup
 * ignores content type parameters and falls back from a vendor type
 * (`application/vnd.acme+json`) to its suffix type (`application/json`).
 */
export class SerializationWriterFactoryRegistry implements SerializationWriterFactory {
  readonly #factories = new Map<string, SerializationWriterFactory>();

  register(factory: ContentTypeWriterFactory): this {
    this.#factories.set(normalizeContentType(factory.validContentType), factory);
    return this;
  }

  get contentTypes(): string[] {
    return [...this.#factories.keys()];
  }

  getWriter(contentType: string): SerializationWriter {
    const normalized = normalizeContentType(contentType);
    if (!normalized) {
      throw new Error('Content type cannot be empty');
    }

    const factory =
      this.#factories.get(normalized) ?? this.#factories.get(stripVendorPrefix(normalized));
    if (!factory) {
      throw new Error(`Content type ${normalized} does not have a serialization writer registered`);
    }

    return factory.getWriter(normalized);
  }
}

export function createDefaultSerializationRegistry(): SerializationWriterFactoryRegistry {
  return new SerializationWriterFactoryRegistry()
    .register(new JsonSerializationWriterFactory())
    .register(new TextSerializationWriterFactory());
}
