export * from './random/prng.js';
export * from './random/distributions.js';
export * from './geometry/vec.js';
export * from './config/types.js';
export { DEFAULT_CONFIG } from './config/defaults.js';
export {
  ConfigurationError,
  assertValidConfig,
  formatIssue,
  resolveConfig,
  validateConfig,
  validateDistribution,
} from './config/schema.js';
export { loadConfigFile, loadConfigFromJson, type ConfigLoadResult } from './config/loader.js';
export * from './field/forceField.js';
export * from './faucets/faucetSet.js';
export * from './stream/integrator.js';
export * from './canvas/accumulator.js';
export * from './run/orchestrator.js';
export * from './run/report.js';
export { toneMapGrid, toneMapPixel, softSaturate, sumToLab } from './render/toneMap.js';
export { encodePpm } from './render/ppm.js';
export { renderImage, resolveRuntimeConfig, defaultOutputName } from './runtime/services.js';
