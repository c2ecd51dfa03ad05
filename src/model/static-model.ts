import { Distribution } from './distribution.js';
import { DirichletModel, type PriorCounts } from './dirichlet.js';
import type { ModelSession, ProbabilityModel } from './types.js';
import type { Alphabet } from './alphabet.js';

/**
 * Non-adaptive model: the same distribution for every history.
 */
export class StaticModel implements ProbabilityModel {
  readonly alphabet: Alphabet;
  private readonly fixedDistribution: Distribution;

  constructor(weights: PriorCounts) {
    // Same validation and ordering as the adaptive model's priors.
    const base = new DirichletModel(weights);
    this.alphabet = base.alphabet;
    this.fixedDistribution = base.distribution([]);
  }

  distribution(history: readonly string[]): Distribution {
    // Unknown symbols in the history are still an error.
    for (const symbol of history) {
      this.alphabet.indexOf(symbol);
    }
    return this.fixedDistribution;
  }

  session(): ModelSession {
    const { alphabet, fixedDistribution } = this;
    return {
      current: () => fixedDistribution,
      observe(symbol: string): void {
        alphabet.indexOf(symbol);
      },
    };
  }
}

/**
 * Build a fixed model from positive integer weights.
 */
export function fixed(weights: PriorCounts): StaticModel {
  return new StaticModel(weights);
}
