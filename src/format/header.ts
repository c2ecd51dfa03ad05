/**
 * Container file format.
 *
 * A bare arithmetic code has no framing: the decoder must know how many
 * symbols to read and under which model. The header carries both:
 * - Magic bytes for file identification
 * - Version for format compatibility
 * - Symbol count and code length in bits
 * - The prior table of the Dirichlet model (UTF-8 JSON)
 */

import { FormatError } from '../errors.js';
import { parsePriorTable, type PriorTable } from './prior-table.js';

/**
 * Magic bytes identifying an arithmetic-coded file.
 * "ARIC" in ASCII.
 */
export const MAGIC_BYTES = new Uint8Array([0x41, 0x52, 0x49, 0x43]);

/**
 * Current format version.
 */
export const FORMAT_VERSION = 1;

/**
 * Size of the fixed part of the header in bytes; the prior table follows.
 */
export const HEADER_FIXED_SIZE = 17;

/**
 * Compressed file header structure.
 */
export interface CompressedHeader {
  /** Magic bytes: "ARIC" */
  magic: Uint8Array;

  /** Format version */
  version: number;

  /** Number of symbols in the message */
  symbolCount: number;

  /** Length of the binary code in bits */
  bitLength: number;

  /** Prior counts of the model the message was coded with */
  priors: PriorTable;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Create a header for a compressed file.
 */
export function createHeader(
  symbolCount: number,
  bitLength: number,
  priors: PriorTable
): CompressedHeader {
  return {
    magic: new Uint8Array(MAGIC_BYTES),
    version: FORMAT_VERSION,
    symbolCount,
    bitLength,
    priors,
  };
}

const UINT32_MAX = 0xffffffff;

function checkUint32(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
    throw new FormatError(
      `Invalid header: ${field} must be an integer in [0, ${UINT32_MAX}], got ${value}`
    );
  }
}

/**
 * Serialize a header to bytes.
 */
export function serializeHeader(header: CompressedHeader): Uint8Array {
  const table = textEncoder.encode(JSON.stringify(header.priors));
  checkUint32('symbolCount', header.symbolCount);
  checkUint32('bitLength', header.bitLength);
  checkUint32('prior table length', table.length);
  const bytes = new Uint8Array(HEADER_FIXED_SIZE + table.length);
  const view = new DataView(bytes.buffer);

  // Magic (4 bytes)
  bytes.set(header.magic, 0);

  // Version (1 byte)
  view.setUint8(4, header.version);

  // Symbol count, bit length, table length (4 bytes each, little-endian)
  view.setUint32(5, header.symbolCount, true);
  view.setUint32(9, header.bitLength, true);
  view.setUint32(13, table.length, true);

  bytes.set(table, HEADER_FIXED_SIZE);

  return bytes;
}

/**
 * Deserialize a header from bytes.
 *
 * @returns The header and its size in bytes
 */
export function deserializeHeader(data: Uint8Array): {
  header: CompressedHeader;
  size: number;
} {
  if (data.length < HEADER_FIXED_SIZE) {
    throw new FormatError(
      `Invalid header: expected at least ${HEADER_FIXED_SIZE} bytes, got ${data.length}`
    );
  }

  const view = new DataView(data.buffer, data.byteOffset, HEADER_FIXED_SIZE);

  const magic = data.slice(0, 4);
  if (!MAGIC_BYTES.every((byte, i) => magic[i] === byte)) {
    throw new FormatError('Invalid file format: magic bytes mismatch');
  }

  const version = view.getUint8(4);
  if (version > FORMAT_VERSION) {
    throw new FormatError(
      `Unsupported format version: ${version} (max supported: ${FORMAT_VERSION})`
    );
  }

  const tableLength = view.getUint32(13, true);
  const size = HEADER_FIXED_SIZE + tableLength;
  if (data.length < size) {
    throw new FormatError(
      `Invalid header: prior table needs ${tableLength} bytes, got ${data.length - HEADER_FIXED_SIZE}`
    );
  }

  let tableText: string;
  try {
    tableText = textDecoder.decode(data.subarray(HEADER_FIXED_SIZE, size));
  } catch {
    throw new FormatError('Invalid header: prior table is not valid UTF-8');
  }

  return {
    header: {
      magic,
      version,
      symbolCount: view.getUint32(5, true),
      bitLength: view.getUint32(9, true),
      priors: parsePriorTable(tableText, (message) => new FormatError(message)),
    },
    size,
  };
}

/**
 * Combine header and payload into a single buffer.
 */
export function combineHeaderAndPayload(
  header: Uint8Array,
  payload: Uint8Array
): Uint8Array {
  const result = new Uint8Array(header.length + payload.length);
  result.set(header, 0);
  result.set(payload, header.length);
  return result;
}

/**
 * Split data into header and payload.
 */
export function splitHeaderAndPayload(
  data: Uint8Array
): { header: CompressedHeader; payload: Uint8Array } {
  const { header, size } = deserializeHeader(data);
  const payload = data.slice(size);
  if (payload.length * 8 < header.bitLength) {
    throw new FormatError(
      `Truncated payload: ${header.bitLength} bits declared, ${payload.length * 8} available`
    );
  }
  return { header, payload };
}
