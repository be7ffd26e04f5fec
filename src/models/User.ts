import { Role } from '@/constants/banking';

/**
 * User model
 * Matches the 'users' table schema
 *
 * failedLoginAttempts and lockedUntil cache the last lockout decision.
 * The login_attempts log stays authoritative.
 */
export interface User {
  id: number;
  username: string;
  email: string;
  fullName: string;
  phoneEncrypted: string | null; // ciphertext, see EncryptionService
  passwordHash: string;
  role: Role;
  isActive: boolean;
  failedLoginAttempts: number;
  lockedUntil: Date | null;
  lastLogin: Date | null;
  createdAt: Date;
}

/**
 * User creation input
 */
export interface CreateUserInput {
  username: string;
  email: string;
  fullName: string;
  phoneEncrypted: string | null;
  passwordHash: string;
  role: Role;
}

/**
 * User as returned by the API
 * Never carries the password hash
 */
export interface PublicUser {
  id: number;
  username: string;
  email: string;
  fullName: string;
  phone: string | null;
  role: Role;
  isActive: boolean;
  lastLogin: Date | null;
  createdAt: Date;
}
