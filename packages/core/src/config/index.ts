/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  validateConfig,
  validatePatterns,
  validateStringList,
  validateLayerMap,
  mergeConfig,
  DEFAULT_CONFIG,
  DEFAULT_LOD_ROOTS,
  DEFAULT_TEST_PATTERNS,
  CONFIG_DIR,
} from './ConfigLoader.js';
export type { LinterConfig } from './ConfigLoader.js';
