import { createHash } from 'crypto';
import { InstanceTemplate, VirtualInstanceId } from '../types';

/**
 * Resource naming utility class
 */
export class ResourceNamingService {
  private readonly maxNameTagLength = 256;
  private readonly maxDbIdentifierLength = 63;
  private readonly maxClientTokenLength = 64;

  /**
   * Value of the `Name` tag for a resource: `<prefix>-<virtual instance ID>`
   */
  generateInstanceName(template: InstanceTemplate, virtualInstanceId: VirtualInstanceId): string {
    const name = [template.instanceNamePrefix, virtualInstanceId].filter(Boolean).join('-');
    return this.validateAndTruncate(name, this.maxNameTagLength);
  }

  /**
   * Generate an RDS DB instance identifier.
   * - 1 to 63 letters, digits or hyphens
   * - starts with a letter, no trailing hyphen, no two consecutive hyphens
   *
   * The identifier is a pure function of the inputs, so a retried launch for
   * the same virtual instance ID collides with the earlier one instead of
   * creating a second database. When sanitizing changed the name, a hash of
   * the virtual instance ID keeps `vm_1`, `vm.1` and `VM-1` apart.
   */
  generateDbInstanceIdentifier(template: InstanceTemplate, virtualInstanceId: VirtualInstanceId): string {
    const raw = [template.instanceNamePrefix, virtualInstanceId].filter(Boolean).join('-');
    const name = this.sanitizeName(raw).toLowerCase();

    if (name === raw) {
      if (name.length <= this.maxDbIdentifierLength) {
        return name;
      }
      return this.validateAndTruncate(name, this.maxDbIdentifierLength).replace(/-+/g, '-');
    }

    const hash = this.generateShortHash(virtualInstanceId);
    const base = name.substring(0, this.maxDbIdentifierLength - hash.length - 1).replace(/-+$/, '');
    return `${base}-${hash}`;
  }

  /**
   * Idempotency token for an EC2 launch request. Stable for the same virtual
   * instance ID and request ID, at most 64 characters.
   */
  generateClientToken(virtualInstanceId: VirtualInstanceId, requestId: string): string {
    return createHash('md5')
      .update(virtualInstanceId)
      .update(':')
      .update(requestId)
      .digest('hex')
      .substring(0, this.maxClientTokenLength);
  }

  /**
   * Sanitize name to be AWS-compliant
   * - Remove invalid characters
   * - Ensure it starts with a letter
   * - Replace consecutive hyphens with single hyphen
   */
  sanitizeName(name: string): string {
    let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');

    sanitized = sanitized.replace(/-+/g, '-');

    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (sanitized && !/^[a-zA-Z]/.test(sanitized)) {
      sanitized = 'db-' + sanitized;
    }

    if (!sanitized) {
      sanitized = 'db';
    }

    return sanitized;
  }

  /**
   * Validate and truncate name to fit AWS limits
   */
  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    // Truncate and add hash to maintain uniqueness
    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1;
    return name.substring(0, truncatedLength).replace(/-+$/, '') + '-' + hash;
  }

  /**
   * Generate a short hash for uniqueness
   */
  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      const char = input.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash).toString(36).substring(0, 6);
  }
}

/**
 * Convenience function to create a new resource naming service
 */
export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}
