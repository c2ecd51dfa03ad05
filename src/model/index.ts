export { Alphabet, compareSymbols } from './alphabet.js';
export { Distribution } from './distribution.js';
export { DirichletModel, dirichlet, type PriorCounts } from './dirichlet.js';
export { StaticModel, fixed } from './static-model.js';
export { openSession, type ProbabilityModel, type ModelSession } from './types.js';
export { idealCodeLength } from './code-length.js';
