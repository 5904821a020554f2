import { logger } from '../lib/logger';
import { ValidationError } from '../lib/errors';
import type { TokenClaims } from '../lib/auth';
import type { UserRepository } from '../repositories/types';
import type { User } from '../types/entities';

const DEFAULT_DISPLAY_NAME = 'User';
const FALLBACK_EMAIL_DOMAIN = 'unknown.com';

/**
 * IdentityResolver
 * Maps verified token claims onto a local user, creating one on first sight
 */
export class IdentityResolver {
  constructor(private readonly users: UserRepository) {}

  async resolveCurrentUser(claims: TokenClaims): Promise<User> {
    const subject = claims.sub?.trim();
    if (!subject) {
      throw new ValidationError('Token subject claim is required', 'sub');
    }

    const existing = await this.users.findById(subject);
    if (existing) {
      return existing;
    }

    const email = claims.email?.trim() || `${subject}@${FALLBACK_EMAIL_DOMAIN}`;
    const at = email.indexOf('@');
    if (at < 0) {
      throw new ValidationError(`Email claim "${email}" is not an email address`, 'email');
    }

    // Usernames are not de-duplicated: two emails sharing a local part map to the same username
    const user = await this.users.create({
      id: subject,
      username: email.substring(0, at),
      email,
      displayName: claims.name?.trim() || DEFAULT_DISPLAY_NAME,
      role: 'USER',
    });

    logger.info('Created user from token claims', { userId: user.id, username: user.username });
    return user;
  }
}
