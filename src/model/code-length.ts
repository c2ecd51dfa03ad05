import { openSession, type ProbabilityModel } from './types.js';

/**
 * Ideal code length in bits for a message under a model:
 * -log2 ∏ P(x_i | x_<i).
 *
 * An arithmetic code for the same message is at most a few bits longer.
 */
export function idealCodeLength(
  model: ProbabilityModel,
  stream: Iterable<string>
): number {
  const session = openSession(model);
  let bits = 0;
  for (const symbol of stream) {
    const distribution = session.current();
    const weight = distribution.weight(symbol);
    bits += Math.log2(Number(distribution.total)) - Math.log2(Number(weight));
    session.observe(symbol);
  }
  return bits;
}
