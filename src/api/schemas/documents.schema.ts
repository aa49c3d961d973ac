export const addDocumentRequestSchema = {
  type: 'object',
  required: ['content'],
  properties: {
    content: { type: 'string', minLength: 1 },
    metadata: { type: 'object' },
  },
} as const;

export const listDocumentsQuerySchema = {
  type: 'object',
  properties: {
    limit: { type: 'integer', minimum: 1, maximum: 100, default: 20 },
    offset: { type: 'integer', minimum: 0, default: 0 },
  },
} as const;

export const documentIdParamsSchema = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', minLength: 1 },
  },
} as const;

export const deleteAllQuerySchema = {
  type: 'object',
  properties: {
    all: { type: 'boolean', default: false },
  },
} as const;
