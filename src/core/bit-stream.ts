import { assertBinaryCode, type BinaryCode } from './binary-interval.js';

export type Bit = 0 | 1;

/**
 * Packs bits MSB-first into bytes. The last byte is zero-padded on flush.
 */
export class BitOutputStream {
  private bytes: number[] = [];
  private pending: number = 0;
  private written: number = 0;

  writeBit(bit: Bit): void {
    this.pending = (this.pending << 1) | bit;
    this.written++;
    if (this.written % 8 === 0) {
      this.bytes.push(this.pending);
      this.pending = 0;
    }
  }

  writeCode(code: BinaryCode): void {
    assertBinaryCode(code);
    for (const char of code) {
      this.writeBit(char === '1' ? 1 : 0);
    }
  }

  /** Emit the partial byte, if any. Bits written afterwards start a new byte. */
  flush(): void {
    const used = this.written % 8;
    if (used === 0) {
      return;
    }
    this.bytes.push(this.pending << (8 - used));
    this.pending = 0;
    this.written += 8 - used;
  }

  /** Bits written so far, padding included. */
  get bitCount(): number {
    return this.written;
  }

  /** Complete bytes only; flush() first to include a partial one. */
  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

/**
 * Reads bits MSB-first. Reading past the data yields zeros and does not
 * advance the position.
 */
export class BitInputStream {
  private cursor: number = 0;

  constructor(private readonly data: Uint8Array) {}

  readBit(): Bit {
    if (this.isAtEnd) {
      return 0;
    }
    const byte = this.data[this.cursor >>> 3];
    const shift = 7 - (this.cursor & 7);
    this.cursor++;
    return (byte >>> shift) & 1 ? 1 : 0;
  }

  readCode(bitLength: number): BinaryCode {
    let code = '';
    for (let i = 0; i < bitLength; i++) {
      code += this.readBit() === 1 ? '1' : '0';
    }
    return code;
  }

  get isAtEnd(): boolean {
    return this.cursor >= this.data.length * 8;
  }

  /** Bits consumed from the data. */
  get position(): number {
    return this.cursor;
  }
}

/**
 * Pack a binary code into bytes, zero-padding the final byte.
 */
export function packCode(code: BinaryCode): Uint8Array {
  const out = new BitOutputStream();
  out.writeCode(code);
  out.flush();
  return out.toUint8Array();
}

/**
 * Unpack the first `bitLength` bits of `data` as a binary code.
 */
export function unpackCode(data: Uint8Array, bitLength: number): BinaryCode {
  return new BitInputStream(data).readCode(bitLength);
}
