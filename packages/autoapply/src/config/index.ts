export { getEnv, parseEnv, resetEnvCache, type Env } from './env.js';
export { DEFAULT_POLICY, buildPolicy, policyFromEnv } from './policy.js';
export type {
  NavigationPolicy,
  PolicyOverrides,
  DelayRange,
  TextObstacle,
  ObstacleSelectorPattern,
  FieldKindPattern,
} from './policy.js';
