import crypto from 'node:crypto';

const ALGORITHM = 'aes-256-cbc';
const KEY_LENGTH = 32; // 256 bits
const IV_LENGTH = 16; // 128 bits
const SALT_LENGTH = 16;

/**
 * scrypt key for one payload; every payload carries its own salt
 */
function deriveKey(secret: string, salt: Buffer): Buffer {
  if (secret.length < 16) {
    throw new Error('Encryption secret must be at least 16 characters');
  }

  return crypto.scryptSync(secret, salt, KEY_LENGTH);
}

/**
 * Encrypt a string using AES-256-CBC with a key derived from `secret`.
 * The result is self-contained: "salt:iv:content", all hex.
 *
 * @param text - Plain text to encrypt
 * @param secret - Passphrase (min 16 characters)
 */
export function encrypt(text: string, secret: string): string {
  if (text.length === 0) {
    throw new Error('Cannot encrypt empty string');
  }

  const salt = crypto.randomBytes(SALT_LENGTH);
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv(ALGORITHM, deriveKey(secret, salt), iv);

  let encrypted = cipher.update(text, 'utf8', 'hex');
  encrypted += cipher.final('hex');

  return `${salt.toString('hex')}:${iv.toString('hex')}:${encrypted}`;
}

/**
 * Decrypt data produced by encrypt()
 *
 * @throws Error when the payload is malformed or the secret is wrong
 */
export function decrypt(payload: string, secret: string): string {
  const [salt, iv, content] = payload.split(':');
  if (!salt || !iv || !content) {
    throw new Error('Invalid encrypted payload format');
  }

  const decipher = crypto.createDecipheriv(ALGORITHM, deriveKey(secret, Buffer.from(salt, 'hex')), Buffer.from(iv, 'hex'));

  let decrypted = decipher.update(content, 'hex', 'utf8');
  decrypted += decipher.final('utf8');

  return decrypted;
}
