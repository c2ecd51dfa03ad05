/**
 * dyadic-coder
 *
 * Arithmetic coding over exact rational intervals, with adaptive
 * Dirichlet symbol models.
 *
 * @example
 * ```typescript
 * import { dirichlet, encode, decode } from 'dyadic-coder';
 *
 * const model = dirichlet({ a: 1, b: 1, c: 1 });
 * const code = encode(model, 'aabbaacc');
 * console.log(code); // '00011110011110010'
 *
 * decode(model, code, 8).join(''); // 'aabbaacc'
 * ```
 */

// Core arithmetic coding
export {
  ArithmeticEncoder,
  ArithmeticDecoder,
  encode,
  finalizeCode,
  decode,
  binaryInterval,
  around,
  inside,
  extendAround,
  extendInside,
  codeValue,
  cdfInterval,
  findSymbol,
  BitOutputStream,
  BitInputStream,
  packCode,
  unpackCode,
  rational,
  type Rational,
  type BinaryCode,
  type DyadicInterval,
  type CdfInterval,
  type EncoderState,
  type EncoderOptions,
  type EncodeOptions,
  type ProgressInfo,
} from './core/index.js';

// Probability models
export {
  Alphabet,
  Distribution,
  DirichletModel,
  StaticModel,
  dirichlet,
  fixed,
  openSession,
  idealCodeLength,
  type PriorCounts,
  type ProbabilityModel,
  type ModelSession,
} from './model/index.js';

// Text compressor
export {
  Compressor,
  uniformPriors,
  type CompressorOptions,
  type CompressionResult,
} from './compressor.js';

// File format (for advanced usage)
export {
  type CompressedHeader,
  type PriorTable,
  MAGIC_BYTES,
  FORMAT_VERSION,
  HEADER_FIXED_SIZE,
  createHeader,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
  parsePriorTable,
} from './format/index.js';

// Errors
export {
  ArithmeticCodingError,
  UnknownSymbolError,
  InvalidPriorError,
  PrecisionOverflowError,
  IntervalError,
  EncoderStateError,
  FormatError,
  type ErrorCode,
} from './errors.js';
