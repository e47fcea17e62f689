/**
 * Bearer token authenticator
 *
 * Tokens are issued elsewhere; this side only verifies them and resolves the
 * user whose email is the token subject.
 */

import { jwtVerify } from 'jose';
import type { Authenticator, IUserRepository } from '../types';
import type { User } from '../models/User';
import { UnauthorizedError, errorMessage } from '../utils/error';
import { logger } from '../utils/logger';

export const ACCESS_TOKEN_SCOPE = 'access_token';

export interface AuthServiceOptions {
  secret: string;
  algorithm: string;
}

export class AuthService implements Authenticator {
  private readonly key: Uint8Array;
  private readonly algorithm: string;

  constructor(
    private readonly userRepository: IUserRepository,
    options: AuthServiceOptions
  ) {
    this.key = new TextEncoder().encode(options.secret);
    this.algorithm = options.algorithm;
  }

  public async authenticate(token: string, traceId: string): Promise<User> {
    const log = logger.withTrace(traceId);
    const email = await this.verifyAccessToken(token, traceId);

    const user = await this.userRepository.findByEmail(email, traceId);
    if (!user) {
      log.warn('Authentication failed: unknown user');
      throw new UnauthorizedError();
    }

    log.debug('Authentication successful', { userId: user.id });
    return user;
  }

  /**
   * Returns the subject of a valid access token
   */
  private async verifyAccessToken(token: string, traceId: string): Promise<string> {
    try {
      const { payload } = await jwtVerify(token, this.key, { algorithms: [this.algorithm] });

      if (payload.scope !== ACCESS_TOKEN_SCOPE || typeof payload.sub !== 'string') {
        throw new UnauthorizedError('Invalid scope for token');
      }

      return payload.sub;
    } catch (error) {
      logger.withTrace(traceId).warn('Authentication failed: token rejected', {
        error: errorMessage(error),
      });
      throw new UnauthorizedError();
    }
  }
}
