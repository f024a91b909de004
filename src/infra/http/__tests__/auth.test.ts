import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { fakeRemoteDataSource, StubNetworkInfo } from '../../../test/fakes.js';
import {
  EmailTakenError,
  InvalidCredentialsError,
  UserNotFoundError,
} from '../../data/exceptions.js';
import { issueToken, verifyToken } from '../token.js';
import { buildApp, buildDependencies, TOKEN_OPTIONS } from './helpers.js';

function bearer(userId = 1, email = 'a@b.com') {
  return `Bearer ${issueToken({ id: userId, email }, TOKEN_OPTIONS)}`;
}

describe('Auth API', () => {
  describe('POST /api/auth/register', () => {
    it('creates a user', async () => {
      const dataSource = fakeRemoteDataSource({
        register: vi.fn(async () => ({ id: 2, email: 'new@example.com' })),
      });
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(true)));

      const response = await request(app).post('/api/auth/register').send({
        email: 'new@example.com',
        password: 'password123',
      });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ user: { id: 2, email: 'new@example.com' } });
      expect(dataSource.register).toHaveBeenCalledWith({
        email: 'new@example.com',
        password: 'password123',
      });
    });

    it('rejects a short password before reaching the data source', async () => {
      const dataSource = fakeRemoteDataSource();
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(true)));

      const response = await request(app).post('/api/auth/register').send({
        email: 'user@example.com',
        password: 'short',
      });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.details.issues[0].path).toBe('password');
      expect(dataSource.register).not.toHaveBeenCalled();
    });

    it('answers 409 for a taken email', async () => {
      const dataSource = fakeRemoteDataSource({
        register: vi.fn(async () => {
          throw new EmailTakenError();
        }),
      });
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(true)));

      const response = await request(app).post('/api/auth/register').send({
        email: 'duplicate@example.com',
        password: 'password123',
      });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        code: 'CONFLICT',
        message: 'User with this email already exists',
      });
    });
  });

  describe('POST /api/auth/login', () => {
    it('returns a token for the user', async () => {
      const app = buildApp(
        buildDependencies(fakeRemoteDataSource(), new StubNetworkInfo(true))
      );

      const response = await request(app).post('/api/auth/login').send({
        email: 'a@b.com',
        password: 'x',
      });

      expect(response.status).toBe(200);
      expect(response.body.user).toEqual({ id: 1, email: 'a@b.com' });
      expect(verifyToken(response.body.token, 'test-secret')).toMatchObject({
        userId: 1,
        email: 'a@b.com',
      });
    });

    it('answers 503 when offline and never calls the data source', async () => {
      const dataSource = fakeRemoteDataSource();
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(false)));

      const response = await request(app).post('/api/auth/login').send({
        email: 'a@b.com',
        password: 'x',
      });

      expect(response.status).toBe(503);
      expect(response.body).toEqual({
        code: 'NO_CONNECTIVITY',
        message: 'No network connection',
      });
      expect(dataSource.login).not.toHaveBeenCalled();
    });

    it('answers 401 for bad credentials', async () => {
      const dataSource = fakeRemoteDataSource({
        login: vi.fn(async () => {
          throw new InvalidCredentialsError();
        }),
      });
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(true)));

      const response = await request(app).post('/api/auth/login').send({
        email: 'a@b.com',
        password: 'wrongpassword',
      });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Invalid email or password',
      });
    });

    it('answers 502 with the message of an unexpected data source error', async () => {
      const dataSource = fakeRemoteDataSource({
        login: vi.fn(async () => {
          throw new Error('timeout');
        }),
      });
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(true)));

      const response = await request(app).post('/api/auth/login').send({
        email: 'a@b.com',
        password: 'x',
      });

      expect(response.status).toBe(502);
      expect(response.body).toEqual({ code: 'SERVER_ERROR', message: 'timeout' });
    });

    it('answers 400 for a body that is not JSON', async () => {
      const app = buildApp(
        buildDependencies(fakeRemoteDataSource(), new StubNetworkInfo(true))
      );

      const response = await request(app)
        .post('/api/auth/login')
        .set('Content-Type', 'application/json')
        .send('{"email":');

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('INVALID_JSON');
    });
  });

  describe('GET /api/auth/me', () => {
    it('returns the user of the token', async () => {
      const dataSource = fakeRemoteDataSource({
        getUser: vi.fn(async () => ({ id: 4, email: 'me@example.com' })),
      });
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(true)));

      const response = await request(app)
        .get('/api/auth/me')
        .set('Authorization', bearer(4, 'me@example.com'));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ user: { id: 4, email: 'me@example.com' } });
      expect(dataSource.getUser).toHaveBeenCalledWith(4);
    });

    it('rejects a request without a token', async () => {
      const app = buildApp(
        buildDependencies(fakeRemoteDataSource(), new StubNetworkInfo(true))
      );

      const response = await request(app).get('/api/auth/me');

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Missing or invalid authorization header');
    });

    it('rejects a token signed with another secret', async () => {
      const app = buildApp(
        buildDependencies(fakeRemoteDataSource(), new StubNetworkInfo(true))
      );
      const forged = issueToken(
        { id: 1, email: 'a@b.com' },
        { secret: 'other-secret', expiresInSeconds: 60 }
      );

      const response = await request(app)
        .get('/api/auth/me')
        .set('Authorization', `Bearer ${forged}`);

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Invalid or expired token');
    });

    it('answers 404 when the user no longer exists', async () => {
      const dataSource = fakeRemoteDataSource({
        getUser: vi.fn(async () => {
          throw new UserNotFoundError();
        }),
      });
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(true)));

      const response = await request(app).get('/api/auth/me').set('Authorization', bearer());

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'User not found' });
    });
  });

  describe('POST /api/auth/password', () => {
    it('changes the password of the token user', async () => {
      const dataSource = fakeRemoteDataSource();
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(true)));

      const response = await request(app)
        .post('/api/auth/password')
        .set('Authorization', bearer(1))
        .send({ currentPassword: 'old-password', newPassword: 'new-password' });

      expect(response.status).toBe(204);
      expect(dataSource.changePassword).toHaveBeenCalledWith(1, 'old-password', 'new-password');
    });

    it('answers 401 when the current password is wrong', async () => {
      const dataSource = fakeRemoteDataSource({
        changePassword: vi.fn(async () => {
          throw new InvalidCredentialsError('Current password is incorrect');
        }),
      });
      const app = buildApp(buildDependencies(dataSource, new StubNetworkInfo(true)));

      const response = await request(app)
        .post('/api/auth/password')
        .set('Authorization', bearer(1))
        .send({ currentPassword: 'wrong', newPassword: 'new-password' });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Current password is incorrect',
      });
    });
  });
});
