import { describe, it, expect } from 'vitest';

import { TestUser } from '../test/models.ts';

import { TextSerializationWriter } from './text-serialization-writer.ts';

const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

describe('TextSerializationWriter', () => {
  it('writes a single scalar', () => {
    const writer = new TextSerializationWriter();
    writer.writeNumberValue(null, 42);

    expect(decode(writer.getSerializedContent())).toBe('42');
  });

  it('refuses objects', () => {
    const writer = new TextSerializationWriter();

    expect(() => writer.writeObject(null, new TestUser('1', 'Ada'))).toThrow(
      'Text serialization only supports a single scalar value',
    );
  });

  it('refuses keyed values and a second value', () => {
    const writer = new TextSerializationWriter();

    expect(() => writer.writeStringValue('name', 'Ada')).toThrow(
      'Text serialization only supports a single scalar value',
    );

    writer.writeBooleanValue(null, true);
    expect(() => writer.writeBooleanValue(null, false)).toThrow(
      'Text serialization only supports a single scalar value',
    );
    expect(decode(writer.getSerializedContent())).toBe('true');
  });
});
