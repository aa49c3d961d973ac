export const errorResponseSchema = {
  type: 'object',
  required: ['error', 'detail'],
  properties: {
    error: { type: 'string' },
    detail: { type: 'string' },
  },
} as const;

export const metadataFilterSchema = {
  type: 'object',
  additionalProperties: { type: ['string', 'number', 'boolean'] },
} as const;
