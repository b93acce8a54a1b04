import { InstanceTemplate, VirtualInstanceId } from '../types';
import { TagMap } from './types';

export const DEFAULT_CORRELATION_TAG_KEY = 'instance-allocator:virtual-id';
export const TEMPLATE_TAG_KEY = 'instance-allocator:template';
export const NAME_TAG_KEY = 'Name';

/** EC2 and RDS both cap a resource at 50 tags. */
export const PROVIDER_TAG_LIMIT = 50;
export const MAX_TAG_KEY_LENGTH = 128;
export const MAX_TAG_VALUE_LENGTH = 256;

const TAG_CHARACTERS = /^[\p{L}\p{Z}\p{N}_.:/=+\-@]*$/u;

export class TagValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TagValidationError';
  }
}

/**
 * Builds the tag set written onto every resource the allocator launches.
 * The correlation tag is the only link between a virtual instance ID and the
 * provider resource, so it always wins over a user tag with the same key.
 */
export class TagHelper {
  readonly reservedKeys: readonly string[];

  constructor(
    readonly correlationKey: string = DEFAULT_CORRELATION_TAG_KEY,
    private readonly commonTags: TagMap = {}
  ) {
    this.reservedKeys = [correlationKey, TEMPLATE_TAG_KEY, NAME_TAG_KEY];
  }

  get maxUserTags(): number {
    return PROVIDER_TAG_LIMIT - this.reservedKeys.length;
  }

  getUserDefinedTags(template: InstanceTemplate): TagMap {
    return { ...this.commonTags, ...template.tags };
  }

  getInstanceTags(template: InstanceTemplate, virtualInstanceId: VirtualInstanceId, instanceName: string): TagMap {
    return {
      ...this.getUserDefinedTags(template),
      [NAME_TAG_KEY]: instanceName,
      [TEMPLATE_TAG_KEY]: template.name,
      [this.correlationKey]: virtualInstanceId
    };
  }

  /**
   * Validates user tags against provider limits.
   * @throws TagValidationError
   */
  validateTags(tags: TagMap): void {
    const keys = Object.keys(tags).filter(key => !this.reservedKeys.includes(key));
    if (keys.length > this.maxUserTags) {
      throw new TagValidationError(`Number of tags exceeds the maximum of ${this.maxUserTags}`);
    }

    for (const [key, value] of Object.entries(tags)) {
      if (key.length === 0 || key.length > MAX_TAG_KEY_LENGTH) {
        throw new TagValidationError(`Tag key must be 1-${MAX_TAG_KEY_LENGTH} characters: "${key}"`);
      }
      if (key.toLowerCase().startsWith('aws:')) {
        throw new TagValidationError(`Tag key must not use the reserved "aws:" prefix: "${key}"`);
      }
      if (value.length > MAX_TAG_VALUE_LENGTH) {
        throw new TagValidationError(`Tag value for "${key}" exceeds ${MAX_TAG_VALUE_LENGTH} characters`);
      }
      if (!TAG_CHARACTERS.test(key) || !TAG_CHARACTERS.test(value)) {
        throw new TagValidationError(`Tag "${key}" contains characters the provider does not accept`);
      }
    }
  }

  /**
   * Checks that a virtual instance ID can be stored in the correlation tag.
   */
  validateVirtualInstanceId(virtualInstanceId: VirtualInstanceId): void {
    if (virtualInstanceId.length === 0 || virtualInstanceId.length > MAX_TAG_VALUE_LENGTH) {
      throw new TagValidationError(
        `Virtual instance ID must be 1-${MAX_TAG_VALUE_LENGTH} characters: "${virtualInstanceId}"`
      );
    }
    if (!TAG_CHARACTERS.test(virtualInstanceId)) {
      throw new TagValidationError(`Virtual instance ID contains unsupported characters: "${virtualInstanceId}"`);
    }
  }

  getVirtualInstanceId(tags: TagMap): VirtualInstanceId | undefined {
    return tags[this.correlationKey];
  }
}

export function toTagList(tags: TagMap): Array<{ Key: string; Value: string }> {
  return Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));
}

export function fromTagList(tags: Array<{ Key?: string; Value?: string }> | undefined): TagMap {
  const result: TagMap = {};
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      result[tag.Key] = tag.Value ?? '';
    }
  }
  return result;
}
