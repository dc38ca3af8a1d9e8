/**
 * Content digest engine
 *
 * Computes and verifies OCI content digests (sha256 by default, sha512 accepted).
 * Every write path recomputes the digest; a caller-supplied digest is never trusted.
 */

import * as crypto from 'crypto';
import { DigestMismatchError } from '../errors';

export type DigestAlgorithm = 'sha256' | 'sha512';

export interface ParsedDigest {
  algorithm: DigestAlgorithm;
  hex: string;
}

const HEX_LENGTH: Record<DigestAlgorithm, number> = {
  sha256: 64,
  sha512: 128,
};

function isAlgorithm(value: string): value is DigestAlgorithm {
  return value === 'sha256' || value === 'sha512';
}

/**
 * Parse "algorithm:hex"; returns null when the algorithm is unsupported
 * or the hex part has the wrong length or characters.
 */
export function parseDigest(digest: string): ParsedDigest | null {
  const separator = digest.indexOf(':');
  if (separator <= 0) return null;

  const algorithm = digest.slice(0, separator);
  const hex = digest.slice(separator + 1);
  if (!isAlgorithm(algorithm)) return null;
  if (hex.length !== HEX_LENGTH[algorithm] || !/^[a-f0-9]+$/.test(hex)) return null;

  return { algorithm, hex };
}

export function isValidDigest(digest: string): boolean {
  return parseDigest(digest) !== null;
}

export function computeDigest(content: Buffer | string, algorithm: DigestAlgorithm = 'sha256'): string {
  const hash = crypto.createHash(algorithm);
  hash.update(content);
  return `${algorithm}:${hash.digest('hex')}`;
}

function sameDigest(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/**
 * Verify content against an expected digest.
 * Throws DigestMismatchError on a malformed digest or a mismatch.
 */
export function verifyDigest(content: Buffer | string, expected: string): true {
  const parsed = parseDigest(expected);
  if (!parsed) {
    throw new DigestMismatchError(`invalid digest ${expected}`, { digest: expected });
  }

  const actual = computeDigest(content, parsed.algorithm);
  if (!sameDigest(actual, expected)) {
    throw new DigestMismatchError(`digest mismatch: expected ${expected}, computed ${actual}`, {
      expected,
      actual,
    });
  }
  return true;
}
