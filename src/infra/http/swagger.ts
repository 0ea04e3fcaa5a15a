import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Credit Ledger API',
      version: '1.0.0',
      description: 'Event-sourced ledger of credit balances with reconciliation and payoff optimization',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        MovementRequest: {
          type: 'object',
          required: ['amountCents'],
          properties: {
            amountCents: { type: 'integer', example: 12550 },
            occurredAt: { type: 'string', format: 'date-time' },
            description: { type: 'string' },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'CREDIT_LIMIT_EXCEEDED',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Account acc-1 would reach 120000 cents, above its limit of 100000 cents',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
      },
    },
    tags: [
      { name: 'Accounts', description: 'Account catalogue and balances' },
      { name: 'Transactions', description: 'Charges, payments and balance updates' },
      { name: 'Transfers', description: 'Balance transfers between accounts' },
      { name: 'History', description: 'Event history and snapshots' },
      { name: 'Reconciliation', description: 'Matching the ledger to external balances' },
      { name: 'Optimization', description: 'Phase, arbitrage and payoff planning' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);

