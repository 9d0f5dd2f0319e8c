import type { DateOnly } from '../request/parameter-values.ts';

import { assertContentType } from './serialization-writer.ts';
import type {
  ContentTypeWriterFactory,
  Parsable,
  PrimitiveSerializable,
  SerializationWriter,
} from './serialization-writer.ts';

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

type Container = JsonValue[] | JsonObject;

/**
 * Writes model values as UTF-8 JSON. `undefined` values are skipped; dates
 * are written in ISO-8601 form.
 */
export class JsonSerializationWriter implements SerializationWriter {
  #root: JsonValue | undefined;
  readonly #stack: Container[] = [];

  writeStringValue(key: string | null, value: string | null | undefined): void {
    if (value !== undefined) this.#put(key, value);
  }

  writeNumberValue(key: string | null, value: number | null | undefined): void {
    if (value === undefined) return;
    if (value !== null && !Number.isFinite(value)) {
      throw new Error(`${String(value)} cannot be written as a JSON number (key: ${key ?? '(root)'})`);
    }
    this.#put(key, value);
  }

  writeBooleanValue(key: string | null, value: boolean | null | undefined): void {
    if (value !== undefined) this.#put(key, value);
  }

  writeDateValue(key: string | null, value: Date | null | undefined): void {
    if (value === undefined) return;
    this.#put(key, value === null ? null : value.toISOString());
  }

  writeDateOnlyValue(key: string | null, value: DateOnly | null | undefined): void {
    if (value === undefined) return;
    this.#put(key, value === null ? null : value.toString());
  }

  writeNullValue(key: string | null): void {
    this.#put(key, null);
  }

  writeCollectionOfPrimitiveValues(
    key: string | null,
    values: readonly PrimitiveSerializable[] | null | undefined,
  ): void {
    if (values === undefined) return;
    this.#put(key, values === null ? null : [...values]);
  }

  writeObject(key: string | null, value: Parsable | null | undefined): void {
    if (value === undefined) return;
    if (value === null) {
      this.#put(key, null);
      return;
    }

    const object: JsonObject = {};
    this.#put(key, object);
    this.#nested(object, () => value.serialize(this));
  }

  writeObjectCollection(key: string | null, values: readonly Parsable[] | null | undefined): void {
    if (values === undefined) return;
    if (values === null) {
      this.#put(key, null);
      return;
    }

    const array: JsonValue[] = [];
    this.#put(key, array);
    this.#nested(array, () => {
      for (const value of values) this.writeObject(null, value);
    });
  }

  getSerializedContent(): Uint8Array {
    if (this.#root === undefined) {
      throw new Error('Nothing has been written to the JSON writer');
    }
    return new TextEncoder().encode(JSON.stringify(this.#root));
  }

  #nested(container: Container, write: () => void): void {
    this.#stack.push(container);
    try {
      write();
    } finally {
      this.#stack.pop();
    }
  }

  #put(key: string | null, value: JsonValue): void {
    const top = this.#stack[this.#stack.length - 1];

    if (top === undefined) {
      if (this.#root !== undefined) {
        throw new Error('A JSON document can only have one root value');
      }
      this.#root = value;
    } else if (Array.isArray(top)) {
      top.push(value);
    } else {
      if (key === null) {
        throw new Error('Values written inside a JSON object need a key');
      }
      // A plain assignment would treat "__proto__" as the prototype.
      Object.defineProperty(top, key, {
        value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
  }
}

export class JsonSerializationWriterFactory implements ContentTypeWriterFactory {
  readonly validContentType = 'application/json';

  getWriter(contentType: string): SerializationWriter {
    assertContentType(this, contentType);
    return new JsonSerializationWriter();
  }
}
