import { metadataFilterSchema } from './common.schema.js';

export const queryRequestSchema = {
  type: 'object',
  required: ['query'],
  properties: {
    query: { type: 'string', minLength: 1, maxLength: 2000 },
    top_k: { type: 'integer', minimum: 1, maximum: 20 },
    stream: { type: 'boolean', default: false },
    filters: metadataFilterSchema,
  },
} as const;
