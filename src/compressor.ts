import {
  ArithmeticEncoder,
  finalizeCode,
  type ProgressInfo,
} from './core/arithmetic-encoder.js';
import { ArithmeticDecoder } from './core/arithmetic-decoder.js';
import { packCode, unpackCode } from './core/bit-stream.js';
import type { BinaryCode } from './core/binary-interval.js';
import { ONE, ZERO } from './core/rational.js';
import { dirichlet, type DirichletModel } from './model/dirichlet.js';
import { idealCodeLength } from './model/code-length.js';
import {
  createHeader,
  serializeHeader,
  splitHeaderAndPayload,
  combineHeaderAndPayload,
} from './format/header.js';
import type { PriorTable } from './format/prior-table.js';

/**
 * Options for Compressor.
 */
export interface CompressorOptions {
  /**
   * Prior counts of the Dirichlet model. Default: 1 for every symbol of
   * `alphabet`, or of the text being compressed.
   */
  priors?: PriorTable;

  /** Symbols to give a uniform prior when `priors` is not set */
  alphabet?: string;

  /** Precision bound passed to the encoder */
  maxPrecisionBits?: number;

  /** Progress callback */
  onProgress?: (progress: ProgressInfo) => void;
}

/**
 * Result of compression operation.
 */
export interface CompressionResult {
  /** Container bytes (header + packed code) */
  data: Uint8Array;

  /** The binary code itself */
  code: BinaryCode;

  /** Number of symbols (code points) in the text */
  symbolCount: number;

  /** -log2 of the message probability under the model */
  idealBits: number;

  /** Original text size in bytes (UTF-8) */
  originalSize: number;

  /** Container size in bytes */
  compressedSize: number;

  /** originalSize / compressedSize */
  compressionRatio: number;
}

/**
 * Uniform prior over the distinct code points of a string.
 */
export function uniformPriors(symbols: Iterable<string>): PriorTable {
  const priors: PriorTable = {};
  for (const symbol of symbols) {
    priors[symbol] = 1;
  }
  return priors;
}

/**
 * Text compressor: Dirichlet model over code points, arithmetic coding,
 * and a self-describing container.
 *
 * Usage:
 * ```typescript
 * const compressor = new Compressor({ alphabet: 'abc' });
 * const result = compressor.compress('aabbaacc');
 * compressor.decompress(result.data); // 'aabbaacc'
 * ```
 */
export class Compressor {
  private options: CompressorOptions;

  constructor(options: CompressorOptions = {}) {
    this.options = options;
  }

  /**
   * Compress text to container bytes.
   */
  compress(text: string): CompressionResult {
    const originalSize = new TextEncoder().encode(text).length;
    const symbols = Array.from(text);
    const priors =
      this.options.priors ?? uniformPriors(this.options.alphabet ?? symbols);

    const model = this.createModel(priors);
    let code: BinaryCode;
    if (model) {
      const encoder = new ArithmeticEncoder(model, {
        maxPrecisionBits: this.options.maxPrecisionBits,
      });
      for (let i = 0; i < symbols.length; i++) {
        encoder.encode(symbols[i]);
        this.reportProgress('encoding', i + 1, symbols.length);
      }
      code = encoder.finish();
    } else {
      // Empty text without an alphabet: no model, same code as any empty stream.
      code = finalizeCode('', ZERO, ONE);
    }

    const header = serializeHeader(createHeader(symbols.length, code.length, priors));
    const data = combineHeaderAndPayload(header, packCode(code));

    return {
      data,
      code,
      symbolCount: symbols.length,
      idealBits: model ? idealCodeLength(model, symbols) : 0,
      originalSize,
      compressedSize: data.length,
      compressionRatio: originalSize / data.length,
    };
  }

  /**
   * Decompress container bytes back to text.
   */
  decompress(data: Uint8Array): string {
    const { header, payload } = splitHeaderAndPayload(data);

    if (header.symbolCount === 0) {
      return '';
    }

    const model = dirichlet(header.priors);
    const decoder = new ArithmeticDecoder(
      model,
      unpackCode(payload, header.bitLength)
    );

    const symbols: string[] = [];
    for (let i = 0; i < header.symbolCount; i++) {
      symbols.push(decoder.decode());
      this.reportProgress('decoding', i + 1, header.symbolCount);
    }

    return symbols.join('');
  }

  /**
   * Validate the priors as a Dirichlet model. Only an empty text with no
   * explicit priors or alphabet has none.
   */
  private createModel(priors: PriorTable): DirichletModel | undefined {
    if (this.options.priors === undefined && Object.keys(priors).length === 0) {
      return undefined;
    }
    return dirichlet(priors);
  }

  /**
   * Report progress to the callback if provided.
   */
  private reportProgress(
    stage: ProgressInfo['stage'],
    current: number,
    total: number
  ): void {
    this.options.onProgress?.({ stage, current, total });
  }
}
