/**
 * Access controller - repository-level read/write checks with glob rules
 */

import { AccessConfig, Capability } from '../../config';
import { createLogger } from '../../logger';
import { DeniedError, UnauthorizedError } from '../errors';
import { Subject } from '../types/registry';

const logger = createLogger('access');

export const ANONYMOUS_USER = 'anonymous';

/**
 * "*" matches one path component, "**" any number of them.
 */
export function compilePattern(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
  const source = escaped
    .split('**')
    .map((part) => part.replace(/\*/g, '[^/]+'))
    .join('.*');
  return new RegExp(`^${source}$`);
}

export class AccessController {
  private patterns: Map<string, RegExp> = new Map();

  constructor(private config: AccessConfig) {
    for (const rule of config.rules) {
      if (!this.patterns.has(rule.repository)) {
        this.patterns.set(rule.repository, compilePattern(rule.repository));
      }
    }
  }

  /**
   * First matching rule wins; no match falls back to the default policy.
   */
  isAllowed(subject: Subject, repository: string, capability: Capability): boolean {
    if (!this.config.enabled) return true;

    const username = subject.username ?? ANONYMOUS_USER;
    if (subject.username !== undefined && this.config.adminUsers.includes(subject.username)) {
      return true;
    }

    for (const rule of this.config.rules) {
      if (!this.matches(repository, rule.repository)) continue;
      if (rule.users.includes('*') || rule.users.includes(username)) {
        return rule.capabilities.includes(capability);
      }
    }
    return this.config.defaultPolicy === 'allow';
  }

  /**
   * Throws UnauthorizedError for a denied anonymous client, DeniedError otherwise.
   */
  authorize(subject: Subject, repository: string, capability: Capability): void {
    if (this.isAllowed(subject, repository, capability)) return;

    logger.info({ user: subject.username ?? ANONYMOUS_USER, repository, capability }, 'Access denied');
    if (subject.username === undefined) {
      throw new UnauthorizedError(`authentication required to ${capability} ${repository}`);
    }
    throw new DeniedError(`${subject.username} may not ${capability} ${repository}`, {
      repository,
      capability,
    });
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  private matches(repository: string, pattern: string): boolean {
    return (this.patterns.get(pattern) ?? compilePattern(pattern)).test(repository);
  }
}

/**
 * Resolves API keys to subjects. An unknown key yields undefined.
 */
export class ApiKeyResolver {
  private keys: Map<string, string>;

  constructor(apiKeys: Record<string, string>) {
    this.keys = new Map(Object.entries(apiKeys));
  }

  resolve(key: string): Subject | undefined {
    const username = this.keys.get(key);
    return username === undefined ? undefined : { username };
  }

  get enabled(): boolean {
    return this.keys.size > 0;
  }
}
