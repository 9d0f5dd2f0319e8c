import type { DateOnly } from '../request/parameter-values.ts';

/**
 * A structured model that can write itself to a serialization writer.
 */
export interface Parsable {
  serialize(writer: SerializationWriter): void;
}

export type PrimitiveSerializable = string | number | boolean;

/**
 * Writes model values into a payload for one content type. A `null` key
 * writes at the root (or as the next collection element).
 */
export interface SerializationWriter {
  writeStringValue(key: string | null, value: string | null | undefined): void;
  writeNumberValue(key: string | null, value: number | null | undefined): void;
  writeBooleanValue(key: string | null, value: boolean | null | undefined): void;
  writeDateValue(key: string | null, value: Date | null | undefined): void;
  writeDateOnlyValue(key: string | null, value: DateOnly | null | undefined): void;
  writeNullValue(key: string | null): void;
  writeCollectionOfPrimitiveValues(
    key: string | null,
    values: readonly PrimitiveSerializable[] | null | undefined,
  ): void;
  writeObject(key: string | null, value: Parsable | null | undefined): void;
  writeObjectCollection(key: string | null, values: readonly Parsable[] | null | undefined): void;
  getSerializedContent(): Uint8Array;
}

export interface SerializationWriterFactory {
  getWriter(contentType: string): SerializationWriter;
}

/**
 * A writer factory bound to a single content type.
 */
export interface ContentTypeWriterFactory extends SerializationWriterFactory {
  readonly validContentType: string;
}

/**
 * Lower-cases a content type and strips its parameters
 * (`Application/JSON; charset=utf-8` → `application/json`).
 */
export function normalizeContentType(contentType: string): string {
  return (contentType.split(';')[0] ?? '').trim().toLowerCase();
}

/**
 * Collapses a vendor type onto its structured syntax suffix
 * (`application/vnd.acme.v1+json` → `application/json`).
 */
export function stripVendorPrefix(contentType: string): string {
  return contentType.replace(/[^/]+\+/, '');
}

export function assertContentType(factory: ContentTypeWriterFactory, contentType: string): void {
  const normalized = stripVendorPrefix(normalizeContentType(contentType));
  if (normalized !== factory.validContentType) {
    throw new Error(
      `Expected content type ${factory.validContentType} but received ${contentType || '(empty)'}`,
    );
  }
}
