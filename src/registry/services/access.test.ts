/**
 * Unit tests for access control and API key resolution
 */

import { AccessConfig } from '../../config';
import { DeniedError, UnauthorizedError } from '../errors';
import { ANONYMOUS } from '../types/registry';
import { AccessController, ApiKeyResolver, compilePattern } from './access';

describe('compilePattern', () => {
  test('should match one path component per single star', () => {
    const pattern = compilePattern('team/*');
    expect(pattern.test('team/api')).toBe(true);
    expect(pattern.test('team/api/worker')).toBe(false);
    expect(pattern.test('team')).toBe(false);
  });

  test('should match any depth with a double star', () => {
    const pattern = compilePattern('team/**');
    expect(pattern.test('team/api/worker')).toBe(true);
    expect(compilePattern('**').test('anything/at/all')).toBe(true);
  });

  test('should treat dots literally', () => {
    expect(compilePattern('lib.core').test('libxcore')).toBe(false);
    expect(compilePattern('lib.core').test('lib.core')).toBe(true);
  });
});

describe('AccessController', () => {
  const config: AccessConfig = {
    enabled: true,
    defaultPolicy: 'deny',
    adminUsers: ['root'],
    rules: [
      { repository: 'public/**', users: ['*'], capabilities: ['read'] },
      { repository: 'team/*', users: ['alice'], capabilities: ['read', 'write'] },
      { repository: 'team/*', users: ['bob'], capabilities: ['read'] },
      { repository: 'sandbox/*', users: ['anonymous'], capabilities: ['read', 'write'] },
    ],
  };
  const access = new AccessController(config);

  test('should apply the first matching rule', () => {
    expect(access.isAllowed({ username: 'alice' }, 'team/api', 'write')).toBe(true);
    expect(access.isAllowed({ username: 'bob' }, 'team/api', 'read')).toBe(true);
    expect(access.isAllowed({ username: 'bob' }, 'team/api', 'write')).toBe(false);
  });

  test('should let everyone, anonymous included, match a wildcard user', () => {
    expect(access.isAllowed(ANONYMOUS, 'public/base/alpine', 'read')).toBe(true);
    expect(access.isAllowed(ANONYMOUS, 'public/base/alpine', 'write')).toBe(false);
    expect(access.isAllowed(ANONYMOUS, 'sandbox/demo', 'write')).toBe(true);
  });

  test('should fall back to the default policy', () => {
    expect(access.isAllowed({ username: 'carol' }, 'team/api', 'read')).toBe(false);
    expect(access.isAllowed({ username: 'alice' }, 'private', 'read')).toBe(false);
  });

  test('should let admin users through every rule', () => {
    expect(access.isAllowed({ username: 'root' }, 'team/api', 'write')).toBe(true);
    expect(access.isAllowed({ username: 'root' }, 'private', 'write')).toBe(true);
  });

  test('should ask anonymous clients to authenticate and deny known ones', () => {
    expect(() => access.authorize(ANONYMOUS, 'team/api', 'read')).toThrow(UnauthorizedError);
    expect(() => access.authorize({ username: 'bob' }, 'team/api', 'write')).toThrow(DeniedError);
    expect(() => access.authorize({ username: 'alice' }, 'team/api', 'write')).not.toThrow();
  });

  test('should allow everything when disabled', () => {
    const open = new AccessController({ ...config, enabled: false });
    expect(open.isEnabled()).toBe(false);
    expect(open.isAllowed(ANONYMOUS, 'private', 'write')).toBe(true);
  });
});

describe('ApiKeyResolver', () => {
  test('should resolve known keys to subjects', () => {
    const resolver = new ApiKeyResolver({ 'test-key': 'alice' });
    expect(resolver.enabled).toBe(true);
    expect(resolver.resolve('test-key')).toEqual({ username: 'alice' });
    expect(resolver.resolve('other-key')).toBeUndefined();
    expect(new ApiKeyResolver({}).enabled).toBe(false);
  });
});
