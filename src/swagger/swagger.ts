import { OpenAPIV3, OpenAPIV3_1 } from 'openapi-types';

const idParam: OpenAPIV3_1.ParameterObject = {
  name: 'id',
  in: 'path',
  required: true,
  schema: { type: 'integer', minimum: 1 },
};

const notFound: OpenAPIV3.ResponseObject & OpenAPIV3_1.ResponseObject = { description: 'Payment method not found' };

const gatewayResponse: OpenAPIV3.ResponsesObject & OpenAPIV3_1.ResponsesObject = {
  200: {
    description: 'Gateway response (a declined transaction is still a 200 with success=false)',
    content: { 'application/json': { schema: { $ref: '#/components/schemas/GatewayResponse' } } },
  },
  400: { description: 'Invalid body' },
  404: notFound,
};

function dispatchPath(summary: string, schemaRef: string): OpenAPIV3_1.PathItemObject {
  return {
    post: {
      tags: ['Gateway'],
      summary,
      security: [{ bearerAuth: [] }],
      parameters: [idParam],
      requestBody: {
        required: true,
        content: { 'application/json': { schema: { $ref: schemaRef } } },
      },
      responses: gatewayResponse,
    },
  };
}

export const swaggerSpec: OpenAPIV3_1.Document = {
  openapi: '3.0.3',
  info: {
    title: 'Payment Methods API',
    version: '1.0.0',
    description:
      'Configuration of checkout payment methods and dispatch of gateway operations. JWT (Bearer) authentication; writes need the admin role.',
  },
  servers: [{ url: '/api/v1', description: 'API v1 (same host)' }],
  components: {
    securitySchemes: {
      bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
    },
    schemas: {
      Preferences: {
        type: 'object',
        additionalProperties: { type: ['string', 'number', 'boolean', 'null'] },
        example: { server: 'test', test_mode: true, login: null, password: null },
      },
      PaymentMethod: {
        type: 'object',
        properties: {
          id: { type: 'integer' },
          type: { type: 'string', example: 'BogusCreditCard' },
          name: { type: 'string' },
          description: { type: ['string', 'null'] },
          active: { type: 'boolean' },
          available_to_users: { type: 'boolean' },
          available_to_admin: { type: 'boolean' },
          auto_capture: { type: ['boolean', 'null'] },
          position: { type: 'integer' },
          preferences: { $ref: '#/components/schemas/Preferences' },
          deleted_at: { type: ['string', 'null'] },
          created_at: { type: 'string' },
          updated_at: { type: 'string' },
        },
      },
      CreatePaymentMethodDTO: {
        type: 'object',
        required: ['type', 'name'],
        properties: {
          type: { type: 'string' },
          name: { type: 'string', minLength: 1 },
          description: { type: ['string', 'null'] },
          active: { type: 'boolean' },
          available_to_users: { type: 'boolean' },
          available_to_admin: { type: 'boolean' },
          display_on: { type: 'string', enum: ['', 'both', 'front_end', 'back_end'], deprecated: true },
          auto_capture: { type: ['boolean', 'null'] },
          preferences: { $ref: '#/components/schemas/Preferences' },
          store_ids: { type: 'array', items: { type: 'integer' } },
        },
      },
      UpdatePaymentMethodDTO: {
        type: 'object',
        properties: {
          name: { type: 'string', minLength: 1 },
          description: { type: ['string', 'null'] },
          active: { type: 'boolean' },
          available_to_users: { type: 'boolean' },
          available_to_admin: { type: 'boolean' },
          display_on: { type: 'string', enum: ['', 'both', 'front_end', 'back_end'], deprecated: true },
          auto_capture: { type: ['boolean', 'null'] },
          preferences: { $ref: '#/components/schemas/Preferences' },
          store_ids: { type: 'array', items: { type: 'integer' } },
        },
      },
      PaymentSource: {
        type: 'object',
        required: ['kind'],
        properties: {
          kind: { type: 'string', enum: ['credit_card', 'store_credit'] },
          number: { type: 'string' },
          month: { type: 'integer' },
          year: { type: 'integer' },
          cc_type: { type: ['string', 'null'] },
          gateway_payment_profile_id: { type: ['string', 'null'] },
          amount_remaining: { type: 'integer' },
          currency: { type: 'string' },
        },
      },
      SourceTransactionDTO: {
        type: 'object',
        required: ['amount'],
        properties: {
          amount: { type: 'integer', minimum: 0, description: 'Amount in cents' },
          source: { $ref: '#/components/schemas/PaymentSource' },
          options: { type: 'object' },
        },
      },
      CaptureDTO: {
        type: 'object',
        required: ['amount', 'authorization'],
        properties: {
          amount: { type: 'integer', minimum: 0 },
          authorization: { type: 'string' },
          options: { type: 'object' },
        },
      },
      VoidDTO: {
        type: 'object',
        required: ['authorization'],
        properties: {
          authorization: { type: 'string' },
          options: { type: 'object' },
        },
      },
      GatewayResponse: {
        type: 'object',
        properties: {
          success: { type: 'boolean' },
          message: { type: 'string' },
          authorization: { type: ['string', 'null'] },
          test: { type: 'boolean' },
          params: { type: 'object' },
          avs_result: { type: ['object', 'null'] },
        },
      },
    },
  },
  tags: [{ name: 'PaymentMethods' }, { name: 'Gateway' }],
  paths: {
    '/payment-methods': {
      get: {
        tags: ['PaymentMethods'],
        summary: 'List payment methods ordered by position',
        security: [{ bearerAuth: [] }],
        parameters: [
          { name: 'active', in: 'query', schema: { type: 'boolean' } },
          { name: 'available_to_users', in: 'query', schema: { type: 'boolean' } },
          { name: 'available_to_admin', in: 'query', schema: { type: 'boolean' } },
          { name: 'store_id', in: 'query', schema: { type: 'integer' } },
          {
            name: 'display_on',
            in: 'query',
            deprecated: true,
            schema: { type: 'string', enum: ['', 'both', 'front_end', 'back_end'] },
          },
        ],
        responses: {
          200: { description: '{ items, total }' },
          404: { description: 'Unknown store' },
        },
      },
      post: {
        tags: ['PaymentMethods'],
        summary: 'Create a payment method (admin)',
        security: [{ bearerAuth: [] }],
        requestBody: {
          required: true,
          content: { 'application/json': { schema: { $ref: '#/components/schemas/CreatePaymentMethodDTO' } } },
        },
        responses: { 201: { description: 'Created' }, 400: { description: 'Invalid body or preferences' } },
      },
    },
    '/payment-methods/variants': {
      get: {
        tags: ['PaymentMethods'],
        summary: 'Registered payment method variants and their capabilities',
        description: 'Capabilities a variant does not implement are named in `not_implemented`.',
        security: [{ bearerAuth: [] }],
        responses: { 200: { description: '{ items }' } },
      },
    },
    '/payment-methods/variants/{type}/active': {
      get: {
        tags: ['PaymentMethods'],
        summary: 'Whether an active payment method of this type exists',
        security: [{ bearerAuth: [] }],
        parameters: [{ name: 'type', in: 'path', required: true, schema: { type: 'string' } }],
        responses: { 200: { description: '{ type, active }' } },
      },
    },
    '/payment-methods/{id}': {
      get: {
        tags: ['PaymentMethods'],
        summary: 'Get a payment method',
        security: [{ bearerAuth: [] }],
        parameters: [idParam, { name: 'with_deleted', in: 'query', schema: { type: 'boolean' } }],
        responses: { 200: { description: '{ paymentMethod }' }, 404: notFound },
      },
      patch: {
        tags: ['PaymentMethods'],
        summary: 'Update a payment method (admin)',
        security: [{ bearerAuth: [] }],
        parameters: [idParam],
        requestBody: {
          required: true,
          content: { 'application/json': { schema: { $ref: '#/components/schemas/UpdatePaymentMethodDTO' } } },
        },
        responses: { 200: { description: '{ paymentMethod }' }, 400: { description: 'Invalid body' }, 404: notFound },
      },
      delete: {
        tags: ['PaymentMethods'],
        summary: 'Soft-delete a payment method (admin)',
        security: [{ bearerAuth: [] }],
        parameters: [idParam],
        responses: { 204: { description: 'Deleted' }, 404: notFound },
      },
    },
    '/payment-methods/{id}/position': {
      patch: {
        tags: ['PaymentMethods'],
        summary: 'Move a payment method in the ordering (admin)',
        security: [{ bearerAuth: [] }],
        parameters: [idParam],
        requestBody: {
          required: true,
          content: {
            'application/json': {
              schema: { type: 'object', required: ['position'], properties: { position: { type: 'integer', minimum: 1 } } },
            },
          },
        },
        responses: { 200: { description: '{ paymentMethod }' }, 404: notFound },
      },
    },
    '/payment-methods/{id}/reusable-sources': {
      get: {
        tags: ['PaymentMethods'],
        summary: 'Saved sources of a user that this method can charge again',
        security: [{ bearerAuth: [] }],
        parameters: [idParam, { name: 'user_id', in: 'query', schema: { type: 'integer' } }],
        responses: { 200: { description: '{ items }' }, 404: notFound },
      },
    },
    '/payment-methods/{id}/authorize': dispatchPath('Authorize an amount', '#/components/schemas/SourceTransactionDTO'),
    '/payment-methods/{id}/purchase': dispatchPath('Authorize and capture an amount', '#/components/schemas/SourceTransactionDTO'),
    '/payment-methods/{id}/capture': dispatchPath('Capture an authorization', '#/components/schemas/CaptureDTO'),
    '/payment-methods/{id}/void': dispatchPath('Void an authorization', '#/components/schemas/VoidDTO'),
    '/payment-methods/{id}/credit': dispatchPath('Credit (refund) a captured amount', '#/components/schemas/CaptureDTO'),
    '/payment-methods/{id}/cancel': dispatchPath('Cancel a transaction', '#/components/schemas/VoidDTO'),
  },
};
