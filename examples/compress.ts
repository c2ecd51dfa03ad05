/**
 * Example: Compress and decompress text with an adaptive Dirichlet model.
 *
 * Usage:
 *   npx tsx examples/compress.ts
 *
 *   Or with custom text:
 *   npx tsx examples/compress.ts "Your text here"
 */

import { Compressor, dirichlet, encode } from '../src/index.js';

const DEFAULT_TEXT = 'abracadabra, abracadabra, abracadabra';

function main(): void {
  const text = process.argv[2] ?? DEFAULT_TEXT;

  // The textbook message first
  const model = dirichlet({ a: 1, b: 1, c: 1 });
  console.log('🔢 encode(dirichlet({a:1,b:1,c:1}), "aabbaacc")');
  console.log(`  ${encode(model, 'aabbaacc')}`);
  console.log();

  console.log('🗜️  Compressing...');
  const compressor = new Compressor();
  const start = Date.now();
  const result = compressor.compress(text);
  const elapsed = Date.now() - start;

  console.log('📊 Compression results:');
  console.log(`  Symbols:         ${result.symbolCount}`);
  console.log(`  Code length:     ${result.code.length} bits`);
  console.log(`  Ideal length:    ${result.idealBits.toFixed(2)} bits`);
  console.log(`  Original size:   ${result.originalSize} bytes`);
  console.log(`  Container size:  ${result.compressedSize} bytes`);
  console.log(`  Time: ${elapsed}ms`);
  console.log();

  console.log('📤 Decompressing...');
  const decompressed = compressor.decompress(result.data);

  if (decompressed === text) {
    console.log('✅ Verification: PASSED (decompressed matches original)');
  } else {
    console.log('❌ Verification: FAILED (decompressed does not match original)');
    process.exitCode = 1;
  }
}

main();
