export {
  type CompressedHeader,
  MAGIC_BYTES,
  FORMAT_VERSION,
  HEADER_FIXED_SIZE,
  createHeader,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
} from './header.js';

export { type PriorTable, validatePriorTable, parsePriorTable } from './prior-table.js';
