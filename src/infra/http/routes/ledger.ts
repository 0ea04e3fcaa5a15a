import { Router, Request } from 'express';
import { z } from 'zod';
import { ACCOUNT_KINDS } from '../../../domain/ledger/account.js';
import { Money } from '../../../domain/ledger/money.js';
import { Snapshot } from '../../../application/ledger/projectionBuilder.js';
import { LedgerServices } from '../../container.js';
import { authMiddleware } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /api/accounts:
 *   post:
 *     tags: [Accounts]
 *     summary: Open an account
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [name, kind, apr]
 *             properties:
 *               accountId: { type: string }
 *               name: { type: string, example: Everyday Visa }
 *               kind: { type: string, enum: [revolving-credit, home-equity-line, installment-loan] }
 *               apr: { type: number, example: 0.2499 }
 *               creditLimitCents: { type: integer, nullable: true, example: 1000000 }
 *               promoRateExpiresAt: { type: string, format: date-time, nullable: true }
 *               minimumPaymentCents: { type: integer, nullable: true }
 *               openingBalanceCents: { type: integer, example: 250000 }
 *     responses:
 *       201: { description: Created }
 *       400:
 *         description: Validation error
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Account id already taken
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *   get:
 *     tags: [Accounts]
 *     summary: List accounts with current balances
 *     security: [{ bearerAuth: [] }]
 *     responses:
 *       200: { description: OK }
 *
 * /api/accounts/{id}:
 *   get:
 *     tags: [Accounts]
 *     summary: Account terms and current balance
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: Account not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/accounts/{id}/charges:
 *   post:
 *     tags: [Transactions]
 *     summary: Record a charge
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string }
 *       - in: header
 *         name: Idempotency-Key
 *         schema: { type: string }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/MovementRequest' }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: Account not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       409:
 *         description: Credit limit exceeded
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/accounts/{id}/payments:
 *   post:
 *     tags: [Transactions]
 *     summary: Record a payment
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string }
 *       - in: header
 *         name: Idempotency-Key
 *         schema: { type: string }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema: { $ref: '#/components/schemas/MovementRequest' }
 *     responses:
 *       200: { description: OK }
 *       404:
 *         description: Account not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/accounts/{id}/balance:
 *   put:
 *     tags: [Transactions]
 *     summary: Set the balance with one adjustment for the difference
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string }
 *       - in: header
 *         name: Idempotency-Key
 *         schema: { type: string }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [balanceCents]
 *             properties:
 *               balanceCents: { type: integer, example: 76002 }
 *               occurredAt: { type: string, format: date-time }
 *               description: { type: string }
 *     responses:
 *       200: { description: OK (event is null when nothing changed) }
 *
 * /api/accounts/{id}/history:
 *   get:
 *     tags: [History]
 *     summary: Events of one account
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string }
 *       - in: query
 *         name: from
 *         schema: { type: string, format: date-time }
 *       - in: query
 *         name: to
 *         schema: { type: string, format: date-time }
 *     responses:
 *       200: { description: OK }
 *
 * /api/accounts/{id}/history.csv:
 *   get:
 *     tags: [History]
 *     summary: Events of one account as CSV
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200: { description: CSV file }
 *
 * /api/snapshot:
 *   get:
 *     tags: [History]
 *     summary: Balances of every account, now or at a point in time
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: query
 *         name: asOf
 *         schema: { type: string, format: date-time }
 *     responses:
 *       200: { description: OK }
 *
 * /api/transfers:
 *   post:
 *     tags: [Transfers]
 *     summary: Move balance between accounts (atomic)
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: header
 *         name: Idempotency-Key
 *         schema: { type: string }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [fromAccountId, toAccountId, amountCents]
 *             properties:
 *               fromAccountId: { type: string }
 *               toAccountId: { type: string }
 *               amountCents: { type: integer, example: 500000 }
 *               occurredAt: { type: string, format: date-time }
 *               description: { type: string }
 *     responses:
 *       200: { description: OK }
 *       409:
 *         description: Credit limit exceeded or concurrency conflict
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /api/optimizations:
 *   post:
 *     tags: [Optimization]
 *     summary: Phase, arbitrage opportunities, avalanche plan and alerts
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [annualIncomeCents, availableFundsCents]
 *             properties:
 *               annualIncomeCents: { type: integer, example: 9000000 }
 *               availableFundsCents: { type: integer, example: 150000 }
 *               asOf: { type: string, format: date-time }
 *     responses:
 *       200: { description: OK }
 *
 * /api/reconciliations:
 *   post:
 *     tags: [Reconciliation]
 *     summary: Reconcile externally reported balances
 *     security: [{ bearerAuth: [] }]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [records]
 *             properties:
 *               records:
 *                 type: array
 *                 items:
 *                   type: object
 *                   required: [reference, balanceCents, asOf]
 *                   properties:
 *                     reference: { type: string, example: Everyday Visa }
 *                     balanceCents: { type: integer, example: 76002 }
 *                     asOf: { type: string, format: date-time }
 *     responses:
 *       200:
 *         description: >
 *           One outcome per record, in order. Each has a status of ok,
 *           adjusted, needs_review, not_found or failed; a failed record
 *           carries the error and does not stop the records after it.
 */

const isoDate = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const accountParamsSchema = z.object({
  id: z.string().min(1),
});

const openAccountBodySchema = z.object({
  accountId: z.string().min(1).optional(),
  name: z.string().min(1),
  kind: z.enum(ACCOUNT_KINDS),
  apr: z.number(),
  creditLimitCents: z.number().int().nullable().default(null),
  promoRateExpiresAt: isoDate.nullable().optional(),
  minimumPaymentCents: z.number().int().nullable().optional(),
  openedAt: isoDate.optional(),
  openingBalanceCents: z.number().int().optional(),
});

const movementBodySchema = z.object({
  // Sign and size are checked by the domain so its error message reaches the client
  amountCents: z.number().int(),
  occurredAt: isoDate.optional(),
  description: z.string().max(500).optional(),
});

const updateBalanceBodySchema = z.object({
  balanceCents: z.number().int(),
  occurredAt: isoDate.optional(),
  description: z.string().max(500).optional(),
});

const transferBodySchema = z.object({
  fromAccountId: z.string().min(1),
  toAccountId: z.string().min(1),
  amountCents: z.number().int(),
  occurredAt: isoDate.optional(),
  description: z.string().max(500).optional(),
});

const historyQuerySchema = z.object({
  from: isoDate.optional(),
  to: isoDate.optional(),
});

const snapshotQuerySchema = z.object({
  asOf: isoDate.optional(),
});

const optimizationBodySchema = z.object({
  annualIncomeCents: z.number().int().nonnegative(),
  availableFundsCents: z.number().int().nonnegative(),
  asOf: isoDate.optional(),
});

const reconciliationBodySchema = z.object({
  records: z
    .array(
      z.object({
        reference: z.string().min(1),
        balanceCents: z.number().int(),
        asOf: isoDate,
      })
    )
    .min(1),
});

const idempotencyKeySchema = z.string().min(1).max(200).optional();

function idempotencyKeyOf(req: Request): string | undefined {
  return idempotencyKeySchema.parse(req.header('Idempotency-Key'));
}

function snapshotResponse(snapshot: Snapshot) {
  return {
    asOf: snapshot.asOf,
    throughSequence: snapshot.throughSequence,
    balances: Object.fromEntries(snapshot.balances),
  };
}

function csvField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function createLedgerRoutes(services: LedgerServices, jwtSecret: string): Router {
  const router = Router();

  // All routes require authentication
  router.use(authMiddleware(jwtSecret));

  router.post(
    '/accounts',
    validate({ body: openAccountBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.output<typeof openAccountBodySchema> = req.body;
      const result = await services.openAccount.execute(body);
      res.status(201).json(result);
    })
  );

  router.get(
    '/accounts',
    asyncHandler(async (_req, res) => {
      res.json({ accounts: await services.queries.getAccounts() });
    })
  );

  router.get(
    '/accounts/:id',
    validate({ params: accountParamsSchema }),
    asyncHandler(async (req, res) => {
      res.json(await services.queries.getAccount(req.params.id));
    })
  );

  router.post(
    '/accounts/:id/charges',
    validate({ params: accountParamsSchema, body: movementBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.output<typeof movementBodySchema> = req.body;
      const result = await services.recordCharge.execute({
        accountId: req.params.id,
        ...body,
        idempotencyKey: idempotencyKeyOf(req),
      });
      res.json(result);
    })
  );

  router.post(
    '/accounts/:id/payments',
    validate({ params: accountParamsSchema, body: movementBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.output<typeof movementBodySchema> = req.body;
      const result = await services.recordPayment.execute({
        accountId: req.params.id,
        ...body,
        idempotencyKey: idempotencyKeyOf(req),
      });
      res.json(result);
    })
  );

  router.put(
    '/accounts/:id/balance',
    validate({ params: accountParamsSchema, body: updateBalanceBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.output<typeof updateBalanceBodySchema> = req.body;
      const result = await services.updateBalance.execute({
        accountId: req.params.id,
        ...body,
        idempotencyKey: idempotencyKeyOf(req),
      });
      res.json(result);
    })
  );

  router.get(
    '/accounts/:id/history',
    validate({ params: accountParamsSchema }),
    asyncHandler(async (req, res) => {
      const query = historyQuerySchema.parse(req.query);
      const events = await services.queries.queryHistory(req.params.id, query);
      res.json({ events });
    })
  );

  // CSV export
  router.get(
    '/accounts/:id/history.csv',
    validate({ params: accountParamsSchema }),
    asyncHandler(async (req, res) => {
      const account = await services.queries.getAccount(req.params.id);
      const events = await services.queries.queryHistory(req.params.id);

      const csvHeader = 'Date,Kind,Amount,Balance,Description\n';
      const csvRows = events
        .map((event) =>
          [
            event.occurredAt.toISOString().split('T')[0],
            event.kind,
            Money.fromCents(event.amountCents).toString(),
            Money.fromCents(event.balanceAfterCents).toString(),
            csvField(event.description ?? ''),
          ].join(',')
        )
        .join('\n');

      res.setHeader('Content-Type', 'text/csv');
      res.setHeader(
        'Content-Disposition',
        `attachment; filename="history-${account.name.replace(/[^a-zA-Z0-9]/g, '_')}.csv"`
      );
      res.send(csvHeader + csvRows);
    })
  );

  router.get(
    '/snapshot',
    asyncHandler(async (req, res) => {
      const query = snapshotQuerySchema.parse(req.query);
      res.json(snapshotResponse(await services.queries.snapshot(query.asOf)));
    })
  );

  router.post(
    '/transfers',
    validate({ body: transferBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.output<typeof transferBodySchema> = req.body;
      const result = await services.transferBalance.execute({
        ...body,
        idempotencyKey: idempotencyKeyOf(req),
      });
      res.json(result);
    })
  );

  router.post(
    '/optimizations',
    validate({ body: optimizationBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.output<typeof optimizationBodySchema> = req.body;
      res.json(await services.optimization.execute(body));
    })
  );

  router.post(
    '/reconciliations',
    validate({ body: reconciliationBodySchema }),
    asyncHandler(async (req, res) => {
      const body: z.output<typeof reconciliationBodySchema> = req.body;
      const outcomes = await services.reconciliation.runReconciliation(body.records);
      res.json({ outcomes });
    })
  );

  return router;
}
