import swaggerJsdoc from 'swagger-jsdoc';
import { API_VERSION } from './routes/health.js';

const userSummaryProperties = {
  id: { type: 'integer', example: 1 },
  email: { type: 'string', format: 'email', example: 'ada@example.com' },
  name: { type: 'string', example: 'Ada' },
  role: { type: 'string', example: 'user' },
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Users API',
      version: API_VERSION,
      description: 'User registration, login and management behind bearer tokens',
    },
    servers: [
      {
        url: 'http://localhost:8080',
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
        ErrorResponse: {
          type: 'object',
          required: ['error'],
          properties: {
            error: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'User not found',
            },
            details: {
              type: 'array',
              description: 'Every failed constraint, for validation errors',
              items: {
                type: 'object',
                properties: {
                  path: { type: 'string' },
                  message: { type: 'string' },
                },
              },
            },
          },
        },
        UserSummary: {
          type: 'object',
          properties: userSummaryProperties,
        },
        User: {
          type: 'object',
          properties: {
            ...userSummaryProperties,
            active: { type: 'boolean', example: true },
            createdAt: { type: 'string', format: 'date-time' },
            updatedAt: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
    tags: [
      { name: 'Health', description: 'Service status' },
      { name: 'Auth', description: 'Registration and login' },
      { name: 'Users', description: 'User management' },
      { name: 'Profile', description: 'The authenticated caller' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
