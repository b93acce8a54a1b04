import { ResourceNamingService } from './config/naming';
import { AllocationReconciler } from './orchestration/allocation-reconciler';
import { createResourceClient } from './provisioning';
import { TagHelper } from './provisioning/tags';
import { ResourceClient } from './provisioning/types';
import { AllocatorConfig, InstanceTemplate } from './types';
import { Logger, silentLogger } from './utils/logger';

export interface AllocatorOptions {
  logger?: Logger;
  /** Replaces the provider client built from `config.aws`. */
  client?: ResourceClient;
}

export interface Allocator {
  template: InstanceTemplate;
  reconciler: AllocationReconciler;
}

/**
 * Wires a reconciler for one named template of a loaded configuration.
 */
export function createAllocator(config: AllocatorConfig, templateName: string, options: AllocatorOptions = {}): Allocator {
  const template = config.templates[templateName];
  if (!template) {
    const known = Object.keys(config.templates);
    throw new Error(
      `Unknown template "${templateName}". ` + (known.length > 0 ? `Available: ${known.join(', ')}` : 'No templates are configured')
    );
  }

  const logger = options.logger ?? silentLogger;
  const naming = new ResourceNamingService();
  const client = options.client ?? createResourceClient(template.kind, config.aws, { logger, naming });

  const reconciler = new AllocationReconciler(client, {
    settings: config.allocation,
    tagHelper: new TagHelper(config.tags.correlationKey, config.tags.common),
    naming,
    logger
  });

  return { template, reconciler };
}
