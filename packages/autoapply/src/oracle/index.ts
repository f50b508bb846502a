export type { ReasoningOracle } from './types.js';
export { AnthropicOracle, createOracle, type AnthropicOracleOptions } from './anthropic.js';
