/**
 * Unit tests for name validation
 */

import { RepositoryInvalidError, TagInvalidError } from '../errors';
import { NamePolicy, isValidUUID } from './validation';

describe('NamePolicy', () => {
  const names = new NamePolicy();

  test.each(['alpine', 'library/alpine', 'my-org/my_app.v2', 'a/b/c/d'])('should accept repository %s', (name) => {
    expect(() => names.assertRepository(name)).not.toThrow();
  });

  test.each(['', 'MyApp', 'team//api', '/alpine', 'alpine/', 'app-', '-app', 'a..b'])(
    'should reject repository %s',
    (name) => {
      expect(() => names.assertRepository(name)).toThrow(RepositoryInvalidError);
    }
  );

  test('should enforce the configured name length', () => {
    const short = new NamePolicy({ repositoryNameMaxLength: 5, tagMaxLength: 3 });
    expect(() => short.assertRepository('abcde')).not.toThrow();
    expect(() => short.assertRepository('abcdef')).toThrow(RepositoryInvalidError);
    expect(() => short.assertTag('v1.0')).toThrow(TagInvalidError);
  });

  test.each(['latest', 'v1.2.3', '_internal', 'Release-2024_01'])('should accept tag %s', (tag) => {
    expect(() => names.assertTag(tag)).not.toThrow();
  });

  test.each(['', '.hidden', '-dash', 'has space', 'a'.repeat(129)])('should reject tag %s', (tag) => {
    expect(() => names.assertTag(tag)).toThrow(TagInvalidError);
  });
});

describe('isValidUUID', () => {
  test('should accept v4 ids only', () => {
    expect(isValidUUID('3f2b8c1e-9d4a-4f6b-8e2c-1a7d5b9c0e34')).toBe(true);
    expect(isValidUUID('3f2b8c1e-9d4a-1f6b-8e2c-1a7d5b9c0e34')).toBe(false);
    expect(isValidUUID('../../etc/passwd')).toBe(false);
  });
});
