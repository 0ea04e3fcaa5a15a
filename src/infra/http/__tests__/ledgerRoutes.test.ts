import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import jwt from 'jsonwebtoken';
import { Express } from 'express';
import { createApp } from '../app.js';
import { createInMemoryRepositories, createServices } from '../../container.js';
import { PersistenceError } from '../../../application/errors.js';

const JWT_SECRET = 'test-secret';

describe('Ledger API', () => {
  let app: Express;
  let token: string;

  beforeEach(async () => {
    app = createApp({
      services: createServices(createInMemoryRepositories()),
      jwtSecret: JWT_SECRET,
      checkHealth: async () => undefined,
    });
    token = jwt.sign({ sub: 'tester' }, JWT_SECRET, { expiresIn: '1h' });

    await request(app)
      .post('/api/accounts')
      .set('Authorization', `Bearer ${token}`)
      .send({
        accountId: 'visa',
        name: 'Everyday Visa',
        kind: 'revolving-credit',
        apr: 0.2499,
        creditLimitCents: 100000,
        openedAt: '2024-03-01T00:00:00.000Z',
        openingBalanceCents: 76000,
      })
      .expect(201);
  });

  describe('GET /healthz', () => {
    it('should report ok without a token', async () => {
      const response = await request(app).get('/healthz');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok' });
    });

    it('should answer 503 when the store is down', async () => {
      const down = createApp({
        services: createServices(createInMemoryRepositories()),
        jwtSecret: JWT_SECRET,
        checkHealth: async () => {
          throw new PersistenceError('connection refused');
        },
      });

      const response = await request(down).get('/healthz');
      expect(response.status).toBe(503);
      expect(response.body.code).toBe('STORE_UNAVAILABLE');
    });
  });

  describe('authentication', () => {
    it('should reject requests without a token', async () => {
      const response = await request(app).get('/api/accounts');

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('UNAUTHORIZED');
    });

    it('should reject tokens signed with another secret', async () => {
      const forged = jwt.sign({ sub: 'tester' }, 'other-secret');
      const response = await request(app).get('/api/accounts').set('Authorization', `Bearer ${forged}`);

      expect(response.status).toBe(401);
    });
  });

  describe('accounts', () => {
    it('should list accounts with balances', async () => {
      const response = await request(app).get('/api/accounts').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.accounts).toHaveLength(1);
      expect(response.body.accounts[0]).toMatchObject({ accountId: 'visa', balanceCents: 76000 });
    });

    it('should answer 409 for a taken id', async () => {
      const response = await request(app)
        .post('/api/accounts')
        .set('Authorization', `Bearer ${token}`)
        .send({ accountId: 'visa', name: 'Again', kind: 'revolving-credit', apr: 0.1, creditLimitCents: 1000 });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe('CONFLICT');
    });

    it('should answer 404 for an unknown account', async () => {
      const response = await request(app).get('/api/accounts/nope').set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('NOT_FOUND');
    });
  });

  describe('POST /api/accounts/:id/charges', () => {
    it('should record a charge', async () => {
      const response = await request(app)
        .post('/api/accounts/visa/charges')
        .set('Authorization', `Bearer ${token}`)
        .send({ amountCents: 1250, occurredAt: '2024-03-05T00:00:00.000Z' });

      expect(response.status).toBe(200);
      expect(response.body.balanceCents).toBe(77250);
      expect(response.body.event.kind).toBe('charge');
    });

    it('should answer 409 above the credit limit', async () => {
      const response = await request(app)
        .post('/api/accounts/visa/charges')
        .set('Authorization', `Bearer ${token}`)
        .send({ amountCents: 30000 });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        code: 'CREDIT_LIMIT_EXCEEDED',
        message: 'Account visa would reach 106000 cents, above its limit of 100000 cents',
        details: { accountId: 'visa', creditLimitCents: 100000, attemptedBalanceCents: 106000 },
      });
    });

    it('should answer 400 for a malformed body', async () => {
      const response = await request(app)
        .post('/api/accounts/visa/charges')
        .set('Authorization', `Bearer ${token}`)
        .send({ amountCents: 'lots' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('should answer 400 for a non-positive amount', async () => {
      const response = await request(app)
        .post('/api/accounts/visa/charges')
        .set('Authorization', `Bearer ${token}`)
        .send({ amountCents: -5 });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Charge amount must be a positive whole number of cents');
    });

    it('should apply an Idempotency-Key once', async () => {
      const send = () =>
        request(app)
          .post('/api/accounts/visa/charges')
          .set('Authorization', `Bearer ${token}`)
          .set('Idempotency-Key', 'charge-abc')
          .send({ amountCents: 1000 });

      const first = await send();
      const second = await send();

      expect(first.body.duplicate).toBe(false);
      expect(second.body.duplicate).toBe(true);
      expect(second.body.event.eventId).toBe(first.body.event.eventId);
      expect(second.body.balanceCents).toBe(77000);
    });
  });

  describe('PUT /api/accounts/:id/balance', () => {
    it('should write no event when the balance matches', async () => {
      const response = await request(app)
        .put('/api/accounts/visa/balance')
        .set('Authorization', `Bearer ${token}`)
        .send({ balanceCents: 76000 });

      expect(response.status).toBe(200);
      expect(response.body.event).toBeNull();
    });
  });

  describe('history and snapshot', () => {
    it('should return the history of an account', async () => {
      const response = await request(app)
        .get('/api/accounts/visa/history')
        .query({ from: '2024-01-01T00:00:00.000Z' })
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body.events).toHaveLength(1);
      expect(response.body.events[0]).toMatchObject({
        kind: 'adjustment',
        amountCents: 76000,
        occurredAt: '2024-03-01T00:00:00.000Z',
      });
    });

    it('should export the history as CSV', async () => {
      const response = await request(app)
        .get('/api/accounts/visa/history.csv')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.text).toBe('Date,Kind,Amount,Balance,Description\n2024-03-01,adjustment,760.00,760.00,"Opening balance"');
    });

    it('should return balances as of a date', async () => {
      const response = await request(app)
        .get('/api/snapshot')
        .query({ asOf: '2024-02-01T00:00:00.000Z' })
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ asOf: '2024-02-01T00:00:00.000Z', throughSequence: 0, balances: {} });
    });

    it('should answer 400 for a malformed date', async () => {
      const response = await request(app)
        .get('/api/snapshot')
        .query({ asOf: 'yesterday' })
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(400);
    });
  });

  describe('POST /api/reconciliations', () => {
    it('should reconcile by account name', async () => {
      const response = await request(app)
        .post('/api/reconciliations')
        .set('Authorization', `Bearer ${token}`)
        .send({ records: [{ reference: 'Everyday Visa', balanceCents: 76002, asOf: '2024-03-31T00:00:00.000Z' }] });

      expect(response.status).toBe(200);
      expect(response.body.outcomes[0]).toMatchObject({
        status: 'adjusted',
        accountId: 'visa',
        driftCents: 2,
        alert: { kind: 'RECONCILIATION_DRIFT', severity: 'INFO' },
      });
    });
  });

  describe('POST /api/optimizations', () => {
    it('should classify the portfolio', async () => {
      const response = await request(app)
        .post('/api/optimizations')
        .set('Authorization', `Bearer ${token}`)
        .send({ annualIncomeCents: 10_000_000, availableFundsCents: 5000 });

      expect(response.status).toBe(200);
      expect(response.body.phase).toBe('GROWTH');
      expect(response.body.plan.payments[0]).toMatchObject({ accountId: 'visa', minimumCents: 2500, extraCents: 2500 });
    });
  });
});
