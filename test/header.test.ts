import { describe, it, expect } from 'vitest';
import {
  createHeader,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
  HEADER_FIXED_SIZE,
  MAGIC_BYTES,
  FORMAT_VERSION,
} from '../src/format/header.js';
import { FormatError } from '../src/errors.js';

const PRIORS = { a: 1, b: 2, c: 3 };
// '{"a":1,"b":2,"c":3}'
const PRIORS_JSON_LENGTH = 19;

describe('Header', () => {
  it('should create header with correct values', () => {
    const header = createHeader(8, 17, PRIORS);

    expect(header.magic).toEqual(MAGIC_BYTES);
    expect(header.version).toBe(FORMAT_VERSION);
    expect(header.symbolCount).toBe(8);
    expect(header.bitLength).toBe(17);
    expect(header.priors).toEqual(PRIORS);
  });

  it('should serialize to the fixed size plus the prior table', () => {
    const bytes = serializeHeader(createHeader(8, 17, PRIORS));

    expect(bytes.length).toBe(HEADER_FIXED_SIZE + PRIORS_JSON_LENGTH);
    expect(Array.from(bytes.slice(0, 5))).toEqual([0x41, 0x52, 0x49, 0x43, 1]);
    // Symbol count, little-endian
    expect(Array.from(bytes.slice(5, 9))).toEqual([8, 0, 0, 0]);
  });

  it('should reject counts that do not fit in 32 bits', () => {
    for (const [symbolCount, bitLength] of [
      [2 ** 32, 17],
      [-1, 17],
      [8, 2 ** 32 + 5],
      [8, 1.5],
    ]) {
      expect(() => serializeHeader(createHeader(symbolCount, bitLength, PRIORS))).toThrow(
        FormatError
      );
    }
    expect(() => serializeHeader(createHeader(2 ** 32 - 1, 0, PRIORS))).not.toThrow();
  });

  it('should roundtrip through serialize/deserialize', () => {
    const original = createHeader(12345, 67890, { x: 4, '\u{1F600}': 1 });
    const { header, size } = deserializeHeader(serializeHeader(original));

    expect(header).toEqual(original);
    expect(size).toBe(serializeHeader(original).length);
  });

  it('should handle maximum values', () => {
    const original = createHeader(0xffffffff, 0xffffffff, PRIORS);
    const { header } = deserializeHeader(serializeHeader(original));

    expect(header.symbolCount).toBe(0xffffffff);
    expect(header.bitLength).toBe(0xffffffff);
  });

  it('should throw on invalid magic bytes', () => {
    const bytes = serializeHeader(createHeader(1, 1, PRIORS));
    bytes[0] = 0x00;

    expect(() => deserializeHeader(bytes)).toThrow('Invalid file format');
  });

  it('should throw on truncated header', () => {
    expect(() => deserializeHeader(new Uint8Array(10))).toThrow(FormatError);

    const bytes = serializeHeader(createHeader(1, 1, PRIORS));
    expect(() => deserializeHeader(bytes.slice(0, bytes.length - 1))).toThrow(
      'prior table needs 19 bytes'
    );
  });

  it('should throw on unsupported version', () => {
    const bytes = serializeHeader(createHeader(1, 1, PRIORS));
    bytes[4] = 255;

    expect(() => deserializeHeader(bytes)).toThrow('Unsupported format version');
  });

  it('should throw on a malformed prior table', () => {
    const bytes = serializeHeader(createHeader(1, 1, { a: 1 }));
    // '{"a":1}' -> '{"a":0}'
    bytes[HEADER_FIXED_SIZE + 5] = 0x30;
    expect(() => deserializeHeader(bytes)).toThrow(FormatError);

    bytes[HEADER_FIXED_SIZE] = 0x5b; // '['
    expect(() => deserializeHeader(bytes)).toThrow('Invalid prior table JSON');
  });
});

describe('Header + Payload', () => {
  it('should combine and split header and payload', () => {
    const headerBytes = serializeHeader(createHeader(8, 17, PRIORS));
    const payload = new Uint8Array([0x1e, 0x79, 0x00]);
    const combined = combineHeaderAndPayload(headerBytes, payload);

    expect(combined.length).toBe(headerBytes.length + payload.length);

    const { header, payload: extractedPayload } = splitHeaderAndPayload(combined);
    expect(header.symbolCount).toBe(8);
    expect(header.bitLength).toBe(17);
    expect(extractedPayload).toEqual(payload);
  });

  it('should handle empty payload', () => {
    const headerBytes = serializeHeader(createHeader(0, 0, {}));
    const { header, payload } = splitHeaderAndPayload(headerBytes);

    expect(header.symbolCount).toBe(0);
    expect(header.priors).toEqual({});
    expect(payload.length).toBe(0);
  });

  it('should throw when the payload is shorter than the code', () => {
    const headerBytes = serializeHeader(createHeader(8, 17, PRIORS));
    const combined = combineHeaderAndPayload(headerBytes, new Uint8Array([0x1e, 0x79]));

    expect(() => splitHeaderAndPayload(combined)).toThrow('Truncated payload');
  });
});
