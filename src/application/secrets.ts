import {
  createCipheriv,
  createDecipheriv,
  hkdfSync,
  randomBytes,
  scrypt,
  timingSafeEqual,
} from 'node:crypto';

/**
 * Secret handling shared by the hub and the spoke agent.
 *
 * - Passwords and API keys are stored as salted scrypt hashes:
 *   `scrypt$<salt b64url>$<hash b64url>`.
 * - The hub additionally keeps each spoke key sealed with AES-256-GCM
 *   (`v1.<iv>.<tag>.<ciphertext>`), so it can present the key to the
 *   spoke without keeping plaintext at rest.
 * - Every comparison of secret material is constant-time.
 */

const SCRYPT_PREFIX = 'scrypt';
const SALT_BYTES = 16;
const KEY_BYTES = 32;
const SEAL_VERSION = 'v1';

function deriveScrypt(secret: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(secret, salt, KEY_BYTES, (err, derived) => {
      if (err) reject(err);
      else resolve(derived);
    });
  });
}

export async function hashSecret(secret: string): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const derived = await deriveScrypt(secret, salt);
  return `${SCRYPT_PREFIX}$${salt.toString('base64url')}$${derived.toString('base64url')}`;
}

/** Returns false for a wrong secret and for a malformed stored hash. */
export async function verifySecret(secret: string, stored: string): Promise<boolean> {
  const [prefix, saltPart, hashPart] = stored.split('$');
  if (prefix !== SCRYPT_PREFIX || !saltPart || !hashPart) return false;

  const expected = Buffer.from(hashPart, 'base64url');
  if (expected.length !== KEY_BYTES) return false;

  const derived = await deriveScrypt(secret, Buffer.from(saltPart, 'base64url'));
  return timingSafeEqual(derived, expected);
}

/** Constant-time string equality; unequal lengths compare as false. */
export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf-8');
  const right = Buffer.from(b, 'utf-8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

/** Derives a purpose-bound 32-byte key from the hub master secret. */
export function deriveKey(masterSecret: string, purpose: string): Buffer {
  return Buffer.from(hkdfSync('sha256', masterSecret, 'spokewatch', purpose, KEY_BYTES));
}

export function sealSecret(plaintext: string, key: Buffer): string {
  const iv = randomBytes(12);
  const cipher = createCipheriv('aes-256-gcm', key, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);
  const tag = cipher.getAuthTag();
  return [SEAL_VERSION, iv.toString('base64url'), tag.toString('base64url'), ciphertext.toString('base64url')].join('.');
}

/** Throws when the sealed value is malformed or was sealed with another key. */
export function unsealSecret(sealed: string, key: Buffer): string {
  const [version, ivPart, tagPart, dataPart] = sealed.split('.');
  if (version !== SEAL_VERSION || !ivPart || !tagPart || dataPart === undefined) {
    throw new Error('Malformed sealed secret');
  }

  const decipher = createDecipheriv('aes-256-gcm', key, Buffer.from(ivPart, 'base64url'));
  decipher.setAuthTag(Buffer.from(tagPart, 'base64url'));
  return Buffer.concat([
    decipher.update(Buffer.from(dataPart, 'base64url')),
    decipher.final(),
  ]).toString('utf-8');
}
