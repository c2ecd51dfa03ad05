import type { Alphabet } from './alphabet.js';
import type { Distribution } from './distribution.js';

/**
 * A source of symbol probabilities conditioned on the history so far.
 *
 * Any model works with the encoder as long as it returns a distribution
 * over the same alphabet for every history: adaptive counts, a fixed
 * table, context mixing.
 */
export interface ProbabilityModel {
  readonly alphabet: Alphabet;

  /**
   * P(x | history) for every symbol x.
   */
  distribution(history: readonly string[]): Distribution;

  /**
   * Start an incremental view over a fresh, empty history. Must agree with
   * `distribution()` for every history it is fed.
   */
  session?(): ModelSession;
}

/**
 * Incremental model state for a single message. Owned by one encoder or
 * decoder; never shared.
 */
export interface ModelSession {
  /** Distribution for the symbols observed so far. */
  current(): Distribution;

  /** Append a symbol to the history. */
  observe(symbol: string): void;
}

/**
 * Open a session on any model. Models without their own `session()` are
 * replayed from the full history on every step.
 */
export function openSession(model: ProbabilityModel): ModelSession {
  if (model.session) {
    return model.session();
  }

  const history: string[] = [];
  let current = model.distribution(history);
  return {
    current: () => current,
    observe(symbol: string): void {
      model.alphabet.indexOf(symbol); // throws on unknown symbols
      history.push(symbol);
      current = model.distribution(history);
    },
  };
}
