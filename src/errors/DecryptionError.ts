import { AppError } from './AppError';

/**
 * Decryption Error (500)
 * Ciphertext is malformed or failed authentication. Treated as a
 * data-integrity fault: logged in full, rendered as a generic failure.
 */
export class DecryptionError extends AppError {
  constructor(message: string = 'Unable to decrypt value') {
    super(message, 500, 'INTERNAL_ERROR');
    Object.setPrototypeOf(this, DecryptionError.prototype);
  }
}
