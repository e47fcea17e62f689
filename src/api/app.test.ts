import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { ContactService } from '../services/ContactService';
import { User } from '../models/User';
import { InMemoryContactRepository } from '../testing/InMemoryContactRepository';
import { InMemoryRateLimitStore } from '../testing/InMemoryRateLimitStore';
import { listen, type RunningServer } from '../testing/http';
import { UnauthorizedError } from '../utils/error';
import type { Authenticator, HealthStatus } from '../types';

const ANN_TOKEN = 'ann-token';
const BOB_TOKEN = 'bob-token';

const users = new Map<string, User>([
  [ANN_TOKEN, new User({ id: 1, email: 'ann@example.com' })],
  [BOB_TOKEN, new User({ id: 2, email: 'bob@example.com' })],
]);

const authenticator: Authenticator = {
  authenticate: async token => {
    const user = users.get(token);
    if (!user) {
      throw new UnauthorizedError();
    }
    return user;
  },
};

const annBody = {
  name: 'Ann',
  surname: 'Lee',
  email: 'ann@example.com',
  number: '555-0100',
  bd_date: '1990-10-21',
  additional_data: 'met at work',
};

const annResponse = {
  id: 1,
  name: 'Ann',
  surname: 'Lee',
  email: 'ann@example.com',
  number: '555-0100',
  bd_date: '1990-10-21',
  additional_data: 'met at work',
};

const TRACE_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

interface CallOptions {
  token?: string;
  body?: unknown;
  rawBody?: string;
}

describe('contacts API', () => {
  const repository = new InMemoryContactRepository();
  const store = new InMemoryRateLimitStore();
  const redisStatus: HealthStatus = { connected: true, latency: 1 };
  let server: RunningServer;

  beforeAll(async () => {
    const app = createApp({
      contactService: new ContactService(repository),
      authenticator,
      rateLimitStore: store,
      healthIndicators: {
        database: {
          healthCheck: async () => ({ connected: true, latency: 2 }),
          isHealthy: () => true,
        },
        redis: {
          healthCheck: async () => ({ ...redisStatus }),
          isHealthy: () => redisStatus.connected,
        },
      },
      rateLimit: { windowMs: 60_000, maxRequests: 10 },
      clock: () => new Date(2026, 9, 19, 12),
    });
    server = await listen(app);
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    repository.clear();
    store.clear();
    store.unavailable = false;
    redisStatus.connected = true;
    delete redisStatus.error;
  });

  const call = async (method: string, path: string, options: CallOptions = {}) => {
    const headers: Record<string, string> = {};
    if (options.token) {
      headers.Authorization = `Bearer ${options.token}`;
    }

    let body: string | undefined;
    if (options.rawBody !== undefined || options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = options.rawBody ?? JSON.stringify(options.body);
    }

    const response = await fetch(`${server.baseUrl}${path}`, { method, headers, body });
    const payload: unknown = await response.json();
    return { status: response.status, headers: response.headers, body: payload };
  };

  const createAnn = () => call('POST', '/contacts', { token: ANN_TOKEN, body: annBody });

  describe('authentication', () => {
    it('rejects requests without a bearer token', async () => {
      const response = await call('GET', '/contacts');

      expect(response.status).toBe(401);
      expect(response.headers.get('www-authenticate')).toBe('Bearer');
      expect(response.body).toEqual({
        success: false,
        message: 'Not authenticated',
        timestamp: expect.any(String),
        traceId: response.headers.get('x-trace-id'),
      });
    });

    it('rejects unknown tokens', async () => {
      const response = await call('GET', '/contacts', { token: 'stolen-token' });

      expect(response.status).toBe(401);
      expect(response.body).toMatchObject({ message: 'Could not validate credentials' });
    });
  });

  describe('CRUD', () => {
    it('creates a contact and returns it with its id', async () => {
      const response = await createAnn();

      expect(response.status).toBe(201);
      expect(response.body).toEqual(annResponse);
    });

    it('fetches a contact by id', async () => {
      await createAnn();

      const response = await call('GET', '/contacts/1', { token: ANN_TOKEN });

      expect(response.status).toBe(200);
      expect(response.body).toEqual(annResponse);
    });

    it('hides contacts of other users', async () => {
      await createAnn();

      const response = await call('GET', '/contacts/1', { token: BOB_TOKEN });

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({ success: false, message: 'Contact not found' });
    });

    it('rejects a duplicate email and number with 400', async () => {
      await createAnn();

      const response = await call('POST', '/contacts', {
        token: ANN_TOKEN,
        body: { ...annBody, name: 'Annie' },
      });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        message: 'Contact with this number or email already exists',
      });
      expect(repository.count()).toBe(1);
    });

    it('lets another user store the same contact', async () => {
      await createAnn();

      const response = await call('POST', '/contacts', { token: BOB_TOKEN, body: annBody });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ ...annResponse, id: 2 });
    });

    it('replaces every field on update', async () => {
      await createAnn();

      const response = await call('PUT', '/contacts/1', {
        token: ANN_TOKEN,
        body: {
          name: 'Ann',
          surname: 'Park',
          email: 'ann@example.com',
          number: '555-0100',
          bd_date: '1990-10-21',
        },
      });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ ...annResponse, surname: 'Park', additional_data: null });
    });

    it('returns 404 when updating a missing contact', async () => {
      const response = await call('PUT', '/contacts/9', { token: ANN_TOKEN, body: annBody });

      expect(response.status).toBe(404);
      expect(repository.count()).toBe(0);
    });

    it('deletes a contact and returns it', async () => {
      await createAnn();

      const removed = await call('DELETE', '/contacts/1', { token: ANN_TOKEN });
      const after = await call('GET', '/contacts/1', { token: ANN_TOKEN });

      expect(removed.status).toBe(200);
      expect(removed.body).toEqual(annResponse);
      expect(after.status).toBe(404);
    });

    it('stores text fields exactly as sent', async () => {
      const body = {
        ...annBody,
        name: '  Ann  ',
        additional_data: 'notes: javascript: tips, <b onclick="x">bold</b> <script>x</script>',
      };

      const created = await call('POST', '/contacts', { token: ANN_TOKEN, body });
      const fetched = await call('GET', '/contacts/1', { token: ANN_TOKEN });

      expect(created.status).toBe(201);
      expect(fetched.body).toEqual({
        ...annResponse,
        name: '  Ann  ',
        additional_data: 'notes: javascript: tips, <b onclick="x">bold</b> <script>x</script>',
      });
    });

    it('returns 404 when deleting a missing contact', async () => {
      const response = await call('DELETE', '/contacts/3', { token: ANN_TOKEN });

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({ message: 'Contact not found' });
    });
  });

  describe('validation', () => {
    it('reports invalid body fields', async () => {
      const response = await call('POST', '/contacts', {
        token: ANN_TOKEN,
        body: { ...annBody, email: 'not-an-email' },
      });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        success: false,
        message: 'Validation failed',
        details: [{ field: 'email', message: 'Invalid email format', code: 'invalid_string' }],
      });
      expect(repository.count()).toBe(0);
    });

    it('reports out-of-range list parameters', async () => {
      const response = await call('GET', '/contacts?limit=5', { token: ANN_TOKEN });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        details: [{ field: 'limit', message: 'Limit must be at least 10', code: 'too_small' }],
      });
    });

    it('rejects non-numeric contact ids', async () => {
      const response = await call('GET', '/contacts/abc', { token: ANN_TOKEN });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ message: 'Validation failed' });
    });

    it('rejects ids beyond the storable range', async () => {
      const response = await call('GET', '/contacts/2147483648', { token: ANN_TOKEN });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        message: 'Validation failed',
        details: [{ field: 'contactId', message: 'Id cannot exceed 2147483647', code: 'too_big' }],
      });
    });

    it('rejects malformed JSON', async () => {
      const response = await call('POST', '/contacts', { token: ANN_TOKEN, rawBody: '{"name":' });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({ message: 'Malformed JSON body' });
    });
  });

  describe('queries', () => {
    it('lists contacts in insertion order', async () => {
      for (const [name, number] of [
        ['Cid', '1'],
        ['Ann', '2'],
        ['Bea', '3'],
      ]) {
        await call('POST', '/contacts', { token: ANN_TOKEN, body: { ...annBody, name, number } });
      }

      const response = await call('GET', '/contacts', { token: ANN_TOKEN });

      expect(response.status).toBe(200);
      expect(response.body).toEqual([
        { ...annResponse, id: 1, name: 'Cid', number: '1' },
        { ...annResponse, id: 2, name: 'Ann', number: '2' },
        { ...annResponse, id: 3, name: 'Bea', number: '3' },
      ]);
    });

    it('returns an empty list for a user without contacts', async () => {
      await createAnn();

      const response = await call('GET', '/contacts', { token: BOB_TOKEN });

      expect(response.status).toBe(200);
      expect(response.body).toEqual([]);
    });

    it('searches names ignoring case and emails exactly', async () => {
      await createAnn();

      const byName = await call('GET', '/contacts/search/ANN', { token: ANN_TOKEN });
      const byEmail = await call('GET', '/contacts/search/ann@example.com', { token: ANN_TOKEN });
      const byUpperEmail = await call('GET', '/contacts/search/ANN@EXAMPLE.COM', {
        token: ANN_TOKEN,
      });

      expect(byName.body).toEqual([annResponse]);
      expect(byEmail.body).toEqual([annResponse]);
      expect(byUpperEmail.body).toEqual([]);
    });

    it('keeps birthdays of one user away from another', async () => {
      await createAnn();

      const own = await call('GET', '/contacts/birthday/next-week', { token: ANN_TOKEN });
      const other = await call('GET', '/contacts/birthday/next-week', { token: BOB_TOKEN });

      expect(own.body).toEqual([annResponse]);
      expect(other.status).toBe(200);
      expect(other.body).toEqual([]);
    });

    it('lists birthdays in the coming week', async () => {
      await call('POST', '/contacts', {
        token: ANN_TOKEN,
        body: { ...annBody, number: '1', bd_date: '1990-10-21' },
      });
      await call('POST', '/contacts', {
        token: ANN_TOKEN,
        body: { ...annBody, number: '2', bd_date: '1985-10-27' },
      });

      const response = await call('GET', '/contacts/birthday/next-week', { token: ANN_TOKEN });

      expect(response.status).toBe(200);
      expect(response.body).toEqual([{ ...annResponse, number: '1' }]);
    });
  });

  describe('rate limiting', () => {
    it('allows ten calls per endpoint and rejects the eleventh', async () => {
      for (let attempt = 0; attempt < 10; attempt++) {
        const response = await call('GET', '/contacts/birthday/next-week', { token: ANN_TOKEN });
        expect(response.status).toBe(200);
      }

      const limited = await call('GET', '/contacts/birthday/next-week', { token: ANN_TOKEN });
      const otherEndpoint = await call('GET', '/contacts', { token: ANN_TOKEN });
      const otherUser = await call('GET', '/contacts/birthday/next-week', { token: BOB_TOKEN });

      expect(limited.status).toBe(429);
      expect(limited.body).toMatchObject({
        message: 'Rate limit exceeded. Maximum 10 requests per 60 seconds',
      });
      expect(otherEndpoint.status).toBe(200);
      expect(otherUser.status).toBe(200);
    });

    it('answers 503 when the limiter store is down', async () => {
      store.unavailable = true;

      const response = await call('GET', '/contacts', { token: ANN_TOKEN });

      expect(response.status).toBe(503);
    });
  });

  describe('tracing and fallbacks', () => {
    it('tags every response with a trace id', async () => {
      const response = await call('GET', '/contacts/7', { token: ANN_TOKEN });

      expect(response.headers.get('x-trace-id')).toMatch(TRACE_ID);
      expect(response.body).toMatchObject({ traceId: response.headers.get('x-trace-id') });
    });

    it('answers unknown routes with 404', async () => {
      const response = await call('GET', '/nowhere');

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({ message: 'Route GET /nowhere not found' });
    });
  });

  describe('health', () => {
    it('summarizes dependency state without authentication', async () => {
      const response = await call('GET', '/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'healthy',
        services: { database: true, redis: true },
      });
    });

    it('reports 503 when a dependency is down', async () => {
      redisStatus.connected = false;
      redisStatus.error = 'connection lost';

      const response = await call('GET', '/health/detailed');

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({
        status: 'unhealthy',
        checks: {
          database: { healthy: true, responseTime: 2 },
          redis: { healthy: false, error: 'connection lost' },
        },
      });
    });
  });
});
