import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type express from 'express';
import type Database from 'better-sqlite3';
import { createApp } from '../app.js';
import { openDatabase } from '../../db/database.js';
import { TokenIssuer } from '../../../application/auth/tokenIssuer.js';
import { UserRepo } from '../../db/userRepo.js';

describe('Auth API', () => {
  const JWT_SECRET = 'test-secret';
  let app: express.Express;
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(':memory:');
    app = createApp({
      config: {
        jwtSecret: JWT_SECRET,
        adminEmails: new Set(['admin@example.com']),
        tokenTtlSeconds: 3600,
      },
      db,
    });
  });

  afterEach(() => {
    db.close();
  });

  describe('register then /me', () => {
    it('should resolve the registration token to the registered email', async () => {
      const registerResponse = await request(app)
        .post('/auth/register')
        .send({ email: 'a@x.com', password: 'p1' });

      expect(registerResponse.status).toBe(200);
      expect(typeof registerResponse.body.token).toBe('string');
      expect(registerResponse.body.user).toEqual({ email: 'a@x.com', role: 'standard' });

      const meResponse = await request(app)
        .get('/me')
        .set('Authorization', `Bearer ${registerResponse.body.token}`);

      expect(meResponse.status).toBe(200);
      expect(meResponse.body).toEqual({ email: 'a@x.com', role: 'standard' });

      const anonymous = await request(app).get('/me');

      expect(anonymous.status).toBe(401);
    });
  });

  describe('POST /auth/register', () => {
    it('should reject duplicate email', async () => {
      await request(app).post('/auth/register').send({
        email: 'duplicate@example.com',
        password: 'password123',
      });

      const response = await request(app).post('/auth/register').send({
        email: 'Duplicate@Example.com',
        password: 'password123',
      });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        code: 'CONFLICT',
        message: 'User with this email already exists',
      });
    });

    it('should reject invalid email', async () => {
      const response = await request(app).post('/auth/register').send({
        email: 'invalid-email',
        password: 'password123',
      });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
      expect(response.body).toHaveProperty('message', 'Validation failed');
      expect(response.body.details.issues[0].path).toBe('email');
    });

    it('should reject an empty password', async () => {
      const response = await request(app).post('/auth/register').send({
        email: 'user@example.com',
        password: '',
      });

      expect(response.status).toBe(400);
      expect(response.body.details.issues[0].path).toBe('password');
    });

    it('should reject a missing body', async () => {
      const response = await request(app).post('/auth/register');

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });

    it('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/auth/register')
        .set('Content-Type', 'application/json')
        .send('{"email":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Malformed JSON body',
      });
    });

    it('should give allow-listed emails the admin role', async () => {
      const response = await request(app).post('/auth/register').send({
        email: 'admin@example.com',
        password: 'password123',
      });

      expect(response.status).toBe(200);
      expect(response.body.user).toEqual({ email: 'admin@example.com', role: 'admin' });

      const me = await request(app)
        .get('/me')
        .set('Authorization', `Bearer ${response.body.token}`);

      expect(me.body).toEqual({ email: 'admin@example.com', role: 'admin' });
    });
  });

  describe('POST /auth/login', () => {
    beforeEach(async () => {
      await request(app).post('/auth/register').send({
        email: 'loginuser@example.com',
        password: 'password123',
      });
    });

    it('should login with valid credentials', async () => {
      const response = await request(app).post('/auth/login').send({
        email: 'LoginUser@example.com',
        password: 'password123',
      });

      expect(response.status).toBe(200);
      expect(response.body.user).toEqual({ email: 'loginuser@example.com', role: 'standard' });

      const me = await request(app)
        .get('/me')
        .set('Authorization', `Bearer ${response.body.token}`);

      expect(me.status).toBe(200);
      expect(me.body).toEqual({ email: 'loginuser@example.com', role: 'standard' });
    });

    it('should reject invalid password', async () => {
      const response = await request(app).post('/auth/login').send({
        email: 'loginuser@example.com',
        password: 'wrongpassword',
      });

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Invalid email or password',
      });
    });

    it('should reject unknown email', async () => {
      const response = await request(app).post('/auth/login').send({
        email: 'nonexistent@example.com',
        password: 'password123',
      });

      expect(response.status).toBe(401);
      expect(response.body).toHaveProperty('message', 'Invalid email or password');
    });

    it('should reject invalid email format', async () => {
      const response = await request(app).post('/auth/login').send({
        email: 'invalid-email',
        password: 'password123',
      });

      expect(response.status).toBe(400);
      expect(response.body).toHaveProperty('code', 'VALIDATION_ERROR');
    });
  });

  describe('GET /me', () => {
    let token: string;

    beforeEach(async () => {
      const response = await request(app).post('/auth/register').send({
        email: 'protected@example.com',
        password: 'password123',
      });
      token = response.body.token;
    });

    it('should reject request without token', async () => {
      const response = await request(app).get('/me');

      expect(response.status).toBe(401);
      expect(response.headers['www-authenticate']).toBe('Bearer');
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      });
    });

    it('should reject malformed header', async () => {
      const response = await request(app).get('/me').set('Authorization', `Basic ${token}`);

      expect(response.status).toBe(401);
      expect(response.body).toHaveProperty('code', 'UNAUTHORIZED');
    });

    it('should reject invalid token', async () => {
      const response = await request(app)
        .get('/me')
        .set('Authorization', 'Bearer invalid-token');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid token' });
    });

    it('should reject a token signed with another secret', async () => {
      const repo = new UserRepo(db);
      const user = repo.findByEmail('protected@example.com');
      if (!user) {
        throw new Error('expected the registered user');
      }
      const foreign = new TokenIssuer('other-secret', 3600).issue(user);

      const response = await request(app).get('/me').set('Authorization', `Bearer ${foreign}`);

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid token' });
    });

    it('should accept a lower-case scheme', async () => {
      const response = await request(app).get('/me').set('Authorization', `bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ email: 'protected@example.com', role: 'standard' });
    });
  });

  it('should answer unknown routes with NOT_FOUND', async () => {
    const response = await request(app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'Route GET /nope not found' });
  });
});
