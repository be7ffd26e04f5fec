import { PublicUser, User } from '@/models';
import { EncryptionService } from './encryption.service';

/**
 * API view of a user: no password hash, phone decrypted
 */
export function toPublicUser(user: User, encryption: EncryptionService): PublicUser {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    fullName: user.fullName,
    phone: encryption.decryptOptional(user.phoneEncrypted),
    role: user.role,
    isActive: user.isActive,
    lastLogin: user.lastLogin,
    createdAt: user.createdAt,
  };
}
