export * as rational from './rational.js';
export type { Rational } from './rational.js';
export {
  binaryInterval,
  around,
  inside,
  extendAround,
  extendInside,
  insideStepLimit,
  codeValue,
  type BinaryCode,
  type DyadicInterval,
} from './binary-interval.js';
export { cdfInterval, findSymbol, type CdfInterval } from './cumulative-dist.js';
export {
  ArithmeticEncoder,
  encode,
  finalizeCode,
  type EncoderState,
  type EncoderOptions,
  type EncodeOptions,
  type ProgressInfo,
} from './arithmetic-encoder.js';
export { ArithmeticDecoder, decode } from './arithmetic-decoder.js';
export { BitOutputStream, BitInputStream, packCode, unpackCode } from './bit-stream.js';
