/**
 * Repository, tag and upload id validation.
 */

import { ValidationConfig } from '../../config';
import { RepositoryInvalidError, TagInvalidError } from '../errors';

// Each path component: [a-z0-9]+([._-][a-z0-9]+)*
const REPOSITORY_COMPONENT_PATTERN = /^[a-z0-9]+([._-][a-z0-9]+)*$/;

const TAG_PATTERN = /^[a-zA-Z0-9_][a-zA-Z0-9._-]*$/;

const UUID_V4_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export const DEFAULT_VALIDATION: ValidationConfig = {
  repositoryNameMaxLength: 255,
  tagMaxLength: 128,
};

export function isValidUUID(value: string): boolean {
  return UUID_V4_PATTERN.test(value);
}

export class NamePolicy {
  constructor(private config: ValidationConfig = DEFAULT_VALIDATION) {}

  /**
   * Throws RepositoryInvalidError unless `name` is a valid repository name.
   */
  assertRepository(name: string): void {
    if (!name) {
      throw new RepositoryInvalidError(name, 'name is empty');
    }
    if (name.length > this.config.repositoryNameMaxLength) {
      throw new RepositoryInvalidError(name, `name exceeds ${this.config.repositoryNameMaxLength} characters`);
    }
    for (const component of name.split('/')) {
      if (!REPOSITORY_COMPONENT_PATTERN.test(component)) {
        throw new RepositoryInvalidError(name, 'each component must match [a-z0-9]+([._-][a-z0-9]+)*');
      }
    }
  }

  assertTag(tag: string): void {
    if (!tag) {
      throw new TagInvalidError(tag, 'tag is empty');
    }
    if (tag.length > this.config.tagMaxLength) {
      throw new TagInvalidError(tag, `tag exceeds ${this.config.tagMaxLength} characters`);
    }
    if (!TAG_PATTERN.test(tag)) {
      throw new TagInvalidError(tag, 'tag must match [a-zA-Z0-9_][a-zA-Z0-9._-]*');
    }
  }
}
