import swaggerJsdoc from 'swagger-jsdoc';

const envelopeProperties = {
  status: {
    type: 'string',
    enum: ['Success', 'Failure', 'Error'],
    description: 'Failure: expected negative outcome. Error: misuse or tampering.',
  },
  details: {
    type: 'object',
    description: 'Additional error details (optional)',
    additionalProperties: true,
  },
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Messenger Accounts API',
      version: '1.0.0',
      description: 'Registration, login and user directory for the messenger backend',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        Envelope: {
          type: 'object',
          required: ['status', 'data'],
          properties: {
            ...envelopeProperties,
            data: {
              description: 'Payload on success, message otherwise',
              example: 'No User with email: someone@example.com',
            },
          },
        },
        User: {
          type: 'object',
          properties: {
            email: { type: 'string', format: 'email' },
            handle: { type: 'string' },
            public_key: { type: 'string' },
            bio: { type: 'string', nullable: true },
          },
        },
        UserEnvelope: {
          type: 'object',
          required: ['status', 'data'],
          properties: {
            ...envelopeProperties,
            data: { $ref: '#/components/schemas/User' },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Session tokens' },
      { name: 'Users', description: 'Account lifecycle' },
      { name: 'Directory', description: 'Public user lookups' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
