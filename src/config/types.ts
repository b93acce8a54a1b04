// Configuration-specific types
import { AllocatorConfig } from '../types';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<AllocatorConfig>;
  validate(config: unknown): ConfigValidationResult;
}
