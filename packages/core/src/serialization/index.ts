export {
  assertContentType,
  normalizeContentType,
  stripVendorPrefix,
  type ContentTypeWriterFactory,
  type Parsable,
  type PrimitiveSerializable,
  type SerializationWriter,
  type SerializationWriterFactory,
} from './serialization-writer.ts';
export {
  JsonSerializationWriter,
  JsonSerializationWriterFactory,
  type JsonObject,
  type JsonValue,
} from './json-serialization-writer.ts';
export { TextSerializationWriter, TextSerializationWriterFactory } from './text-serialization-writer.ts';
export {
  SerializationWriterFactoryRegistry,
  createDefaultSerializationRegistry,
} from './serialization-writer-factory-registry.ts';
