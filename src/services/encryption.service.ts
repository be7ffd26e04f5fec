import { createCipheriv, createDecipheriv, createHash, hkdfSync, randomBytes } from 'node:crypto';
import { DecryptionError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const log = createLogger('EncryptionService');

const ALGORITHM = 'aes-256-gcm';
const FORMAT_VERSION = 'v1';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const MIN_KEY_MATERIAL_LENGTH = 32;
const HKDF_SALT = 'secure-bank-core:field-encryption';
const HKDF_INFO = 'aes-256-gcm:v1';

/**
 * Encryption Service
 *
 * Symmetric encryption for sensitive fields (transaction descriptions,
 * phone numbers). The AES key is expanded from ENCRYPTION_KEY with HKDF.
 *
 * Ciphertext format: v1.<iv>.<tag>.<data> (base64url parts)
 */
export class EncryptionService {
  private readonly key: Buffer;
  public readonly keyFingerprint: string;

  constructor(keyMaterial: string) {
    if (keyMaterial.length < MIN_KEY_MATERIAL_LENGTH) {
      throw new Error(`Encryption key must be at least ${MIN_KEY_MATERIAL_LENGTH} characters`);
    }

    this.key = Buffer.from(hkdfSync('sha256', keyMaterial, HKDF_SALT, HKDF_INFO, KEY_LENGTH));
    this.keyFingerprint = createHash('sha256').update(this.key).digest('hex').slice(0, 16);
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
    const data = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return [FORMAT_VERSION, iv.toString('base64url'), tag.toString('base64url'), data.toString('base64url')].join('.');
  }

  /**
   * @throws DecryptionError when the value is malformed or fails authentication
   */
  decrypt(ciphertext: string): string {
    const [version, ivText, tagText, dataText, ...rest] = ciphertext.split('.');
    if (version !== FORMAT_VERSION || ivText === undefined || !tagText || dataText === undefined || rest.length > 0) {
      throw this.fault('malformed');
    }

    const iv = Buffer.from(ivText, 'base64url');
    const tag = Buffer.from(tagText, 'base64url');
    if (iv.length !== IV_LENGTH || tag.length !== TAG_LENGTH) {
      throw this.fault('malformed');
    }

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAuthTag(tag);
      const data = Buffer.from(dataText, 'base64url');
      return Buffer.concat([decipher.update(data), decipher.final()]).toString('utf8');
    } catch (error) {
      throw this.fault('authentication failed', error);
    }
  }

  encryptOptional(plaintext: string | null | undefined): string | null {
    return plaintext === null || plaintext === undefined || plaintext === '' ? null : this.encrypt(plaintext);
  }

  decryptOptional(ciphertext: string | null): string | null {
    return ciphertext === null ? null : this.decrypt(ciphertext);
  }

  private fault(reason: string, cause?: unknown): DecryptionError {
    log.error(
      { reason, keyFingerprint: this.keyFingerprint, cause: cause instanceof Error ? cause.message : undefined },
      'Data integrity fault: ciphertext could not be decrypted'
    );
    return new DecryptionError();
  }
}

/**
 * Process-wide instance
 * Initialized once before the server accepts requests. There is no runtime
 * rotation path: rotating keys means re-encrypting stored ciphertext offline.
 */
let instance: EncryptionService | null = null;

export function initializeEncryption(keyMaterial: string): EncryptionService {
  const candidate = new EncryptionService(keyMaterial);

  if (instance) {
    if (instance.keyFingerprint !== candidate.keyFingerprint) {
      throw new Error('Encryption is already initialized with a different key');
    }
    return instance;
  }

  instance = candidate;
  log.info({ keyFingerprint: candidate.keyFingerprint }, 'Encryption service initialized');
  return instance;
}

export function getEncryption(): EncryptionService {
  if (!instance) {
    throw new Error('Encryption service used before initializeEncryption()');
  }
  return instance;
}
