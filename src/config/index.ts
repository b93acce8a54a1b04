export { AllocatorConfigLoader, DEFAULT_CONFIG_PATHS, createConfigLoader, loadDefaultConfig } from './loader';
export { ResourceNamingService, createNamingService } from './naming';
export { getConfigSchema, validateAndNormalizeConfig, validateConfig } from './validator';
export type { ConfigLoader, ConfigValidationResult } from './types';
