import type { DateOnly } from '../request/parameter-values.ts';

import { assertContentType } from './serialization-writer.ts';
import type {
  ContentTypeWriterFactory,
  Parsable,
  PrimitiveSerializable,
  SerializationWriter,
} from './serialization-writer.ts';

const STRUCTURED = 'Text serialization only supports a single scalar value';

/**
 * Writes exactly one scalar value as plain UTF-8 text.
 */
export class TextSerializationWriter implements SerializationWriter {
  #text: string | undefined;

  writeStringValue(key: string | null, value: string | null | undefined): void {
    if (value !== undefined) this.#write(key, value === null ? 'null' : value);
  }

  writeNumberValue(key: string | null, value: number | null | undefined): void {
    if (value !== undefined) this.#write(key, String(value));
  }

  writeBooleanValue(key: string | null, value: boolean | null | undefined): void {
    if (value !== undefined) this.#write(key, String(value));
  }

  writeDateValue(key: string | null, value: Date | null | undefined): void {
    if (value !== undefined) this.#write(key, value === null ? 'null' : value.toISOString());
  }

  writeDateOnlyValue(key: string | null, value: DateOnly | null | undefined): void {
    if (value !== undefined) this.#write(key, String(value));
  }

  writeNullValue(key: string | null): void {
    this.#write(key, 'null');
  }

  writeCollectionOfPrimitiveValues(
    _key: string | null,
    _values: readonly PrimitiveSerializable[] | null | undefined,
  ): void {
    throw new Error(STRUCTURED);
  }

  writeObject(_key: string | null, _value: Parsable | null | undefined): void {
    throw new Error(STRUCTURED);
  }

  writeObjectCollection(_key: string | null, _values: readonly Parsable[] | null | undefined): void {
    throw new Error(STRUCTURED);
  }

  getSerializedContent(): Uint8Array {
    if (this.#text === undefined) {
      throw new Error('Nothing has been written to the text writer');
    }
    return new TextEncoder().encode(this.#text);
  }

  #write(key: string | null, text: string): void {
    if (key !== null || this.#text !== undefined) {
      throw new Error(STRUCTURED);
    }
    this.#text = text;
  }
}

export class TextSerializationWriterFactory implements ContentTypeWriterFactory {
  readonly validContentType = 'text/plain';

  getWriter(contentType: string): SerializationWriter {
    assertContentType(this, contentType);
    return new TextSerializationWriter();
  }
}
