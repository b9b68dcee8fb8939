import { ValidationError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import { isStringArray, type JsonObject, type JsonValue } from '../types/schema.js';

export const TAGGABLE = 'taggable';
export const TAG_ON_CREATE = 'tagOnCreate';
export const TAG_UPDATABLE = 'tagUpdatable';
export const CLOUDFORMATION_SYSTEM_TAGS = 'cloudFormationSystemTags';
export const TAG_PROPERTY = 'tagProperty';
export const TAG_PERMISSIONS = 'permissions';

export const DEFAULT_TAG_PROPERTY = '/properties/Tags';

const PROPERTIES_PREFIX = '/properties/';

type BooleanAttribute =
  | typeof TAGGABLE
  | typeof TAG_ON_CREATE
  | typeof TAG_UPDATABLE
  | typeof CLOUDFORMATION_SYSTEM_TAGS;

const BOOLEAN_ATTRIBUTES: ReadonlySet<string> = new Set<BooleanAttribute>([
  TAGGABLE,
  TAG_ON_CREATE,
  TAG_UPDATABLE,
  CLOUDFORMATION_SYSTEM_TAGS,
]);

function isBooleanAttribute(key: string): key is BooleanAttribute {
  return BOOLEAN_ATTRIBUTES.has(key);
}

function taggingError(message: string, attribute: string): ValidationError {
  return ValidationError.of(
    'semantic',
    message,
    'tagging',
    `#/tagging/${attribute}`
  );
}

export interface ResourceTaggingSnapshot {
  taggable: boolean;
  tagOnCreate: boolean;
  tagUpdatable: boolean;
  cloudFormationSystemTags: boolean;
  tagProperty: string;
  permissions: string[];
}

/**
 * Tagging rules of a resource type. Unconfigured types are fully taggable
 * through `/properties/Tags`.
 */
export class ResourceTagging {
  taggable: boolean;
  tagOnCreate: boolean;
  tagUpdatable: boolean;
  cloudFormationSystemTags: boolean;
  tagProperty: string;
  permissions: string[];

  constructor(taggable: boolean) {
    this.taggable = taggable;
    this.tagOnCreate = taggable;
    this.tagUpdatable = taggable;
    this.cloudFormationSystemTags = taggable;
    this.tagProperty = DEFAULT_TAG_PROPERTY;
    this.permissions = [];
  }

  static defaults(): ResourceTagging {
    return new ResourceTagging(true);
  }

  /**
   * Build from a structured `tagging` block. `taggable` seeds every flag;
   * the other attributes then override individually.
   */
  static fromConfig(
    config: JsonObject
  ): Result<ResourceTagging, ValidationError> {
    const seed = config[TAGGABLE];
    const tagging = new ResourceTagging(typeof seed === 'boolean' ? seed : true);

    for (const [key, value] of Object.entries(config)) {
      const applied = tagging.apply(key, value);
      if (applied.isErr()) return err(applied.error);
    }
    return ok(tagging);
  }

  private apply(key: string, value: JsonValue): Result<void, ValidationError> {
    if (isBooleanAttribute(key)) {
      if (typeof value !== 'boolean') {
        return err(taggingError(`Invalid ${key} value: expected a boolean`, key));
      }
      this[key] = value;
      return ok(undefined);
    }
    if (key === TAG_PROPERTY) {
      if (typeof value !== 'string') {
        return err(taggingError(`Invalid ${key} value: expected a JSON pointer`, key));
      }
      this.tagProperty = value;
      return ok(undefined);
    }
    if (key === TAG_PERMISSIONS) {
      if (!isStringArray(value)) {
        return err(taggingError(`Invalid ${key} value: expected a list of strings`, key));
      }
      this.permissions = [...value];
      return ok(undefined);
    }
    return err(taggingError(`Unrecognized tagging attribute: ${key}`, key));
  }

  resetTaggable(taggable: boolean): void {
    this.taggable = taggable;
    this.tagOnCreate = taggable;
    this.tagUpdatable = taggable;
    this.cloudFormationSystemTags = taggable;
  }

  /**
   * Cross-check against the rest of the definition. Checks run in a fixed
   * order and stop at the first violation.
   */
  validateTaggingMetadata(
    hasUpdateHandler: boolean,
    definesProperty: (name: string) => boolean
  ): Result<void, ValidationError> {
    if (this.tagUpdatable && !hasUpdateHandler) {
      return err(
        taggingError(
          'Invalid tagUpdatable value since update handler is missing',
          TAG_UPDATABLE
        )
      );
    }

    if (!this.tagProperty.startsWith(PROPERTIES_PREFIX)) {
      return err(
        taggingError(
          `Invalid tagProperty value ${this.tagProperty} must start with "/properties"`,
          TAG_PROPERTY
        )
      );
    }

    const propertyName = this.tagProperty.slice(PROPERTIES_PREFIX.length);
    if (this.taggable && !definesProperty(propertyName)) {
      return err(
        taggingError(
          `Invalid tagProperty value since ${propertyName} not found in schema`,
          TAG_PROPERTY
        )
      );
    }
    return ok(undefined);
  }

  clone(): ResourceTagging {
    const copy = new ResourceTagging(this.taggable);
    copy.tagOnCreate = this.tagOnCreate;
    copy.tagUpdatable = this.tagUpdatable;
    copy.cloudFormationSystemTags = this.cloudFormationSystemTags;
    copy.tagProperty = this.tagProperty;
    copy.permissions = [...this.permissions];
    return copy;
  }

  toJSON(): ResourceTaggingSnapshot {
    return {
      taggable: this.taggable,
      tagOnCreate: this.tagOnCreate,
      tagUpdatable: this.tagUpdatable,
      cloudFormationSystemTags: this.cloudFormationSystemTags,
      tagProperty: this.tagProperty,
      permissions: [...this.permissions],
    };
  }
}
