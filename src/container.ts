/**
 * Composition root: wires the store handles into repositories and services
 */

import database from './config/database';
import redisManager from './config/redis';
import configManager from './config/app';
import { ContactRepository } from './repositories/ContactRepository';
import { UserRepository } from './repositories/UserRepository';
import { ContactService } from './services/ContactService';
import { AuthService } from './services/AuthService';
import type { AppDependencies } from './api/app';

export function createDependencies(): AppDependencies {
  const contactRepository = new ContactRepository(database);
  const userRepository = new UserRepository(database);

  return {
    contactService: new ContactService(contactRepository),
    authenticator: new AuthService(userRepository, configManager.getAuthConfig()),
    rateLimitStore: redisManager,
    healthIndicators: {
      database,
      redis: redisManager,
    },
  };
}
