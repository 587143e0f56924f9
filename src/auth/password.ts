/**
 * CareDesk - Password Hashing
 *
 * Salted scrypt from node:crypto. Stored format:
 * `scrypt:N:r:p:salt:hash` (salt and hash base64url encoded).
 */

import { scrypt, randomBytes, timingSafeEqual, type ScryptOptions } from "node:crypto";

const SALT_LENGTH = 16;
const KEY_LENGTH = 64;
const SCRYPT_PARAMS: ScryptOptions = { N: 16384, r: 8, p: 1 };

function derive(password: string, salt: Buffer, keyLength: number, params: ScryptOptions): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    scrypt(password, salt, keyLength, params, (err, derivedKey) => {
      if (err) reject(err);
      else resolve(derivedKey);
    });
  });
}

type ParsedHash = {
  params: ScryptOptions;
  salt: Buffer;
  expected: Buffer;
};

function parseStoredHash(storedHash: string): ParsedHash | null {
  const parts = storedHash.split(":");
  if (parts.length !== 6 || parts[0] !== "scrypt") return null;

  const [, n, r, p, salt, hash] = parts;
  const N = Number(n);
  const blockSize = Number(r);
  const parallel = Number(p);
  if (![N, blockSize, parallel].every(Number.isInteger) || !salt || !hash) return null;

  return {
    params: { N, r: blockSize, p: parallel },
    salt: Buffer.from(salt, "base64url"),
    expected: Buffer.from(hash, "base64url"),
  };
}

export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const hash = await derive(password, salt, KEY_LENGTH, SCRYPT_PARAMS);
  const { N, r, p } = SCRYPT_PARAMS;
  return `scrypt:${N}:${r}:${p}:${salt.toString("base64url")}:${hash.toString("base64url")}`;
}

/**
 * Check a password against a stored hash. Malformed hashes never verify.
 */
export async function verifyPassword(password: string, storedHash: string): Promise<boolean> {
  const parsed = parseStoredHash(storedHash);
  if (!parsed || parsed.expected.length === 0) return false;

  const actual = await derive(password, parsed.salt, parsed.expected.length, parsed.params);
  return timingSafeEqual(actual, parsed.expected);
}
