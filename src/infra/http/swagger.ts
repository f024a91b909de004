import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import swaggerJsdoc from 'swagger-jsdoc';

const ROUTES_DIR = join(dirname(fileURLToPath(import.meta.url)), 'routes');

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Layered Auth API',
      version: '1.0.0',
      description: 'Registration, login and account endpoints',
    },
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        User: {
          type: 'object',
          required: ['id', 'email'],
          properties: {
            id: { type: 'integer', example: 1 },
            email: { type: 'string', format: 'email' },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'NO_CONNECTIVITY',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'No network connection',
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
      { name: 'Auth', description: 'Authentication endpoints' },
      { name: 'Health', description: 'Service status' },
    ],
  },
  // .ts under tsx/vitest, .js once built
  apis: [join(ROUTES_DIR, '*.ts'), join(ROUTES_DIR, '*.js')],
};

export function buildSwaggerSpec(): object {
  return swaggerJsdoc(options);
}
