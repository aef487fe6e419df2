/**
 * AJV JSON Schema for settings.json.
 */

export const settingsSchema = {
  type: 'object' as const,
  properties: {
    dbPath: { type: 'string' as const, minLength: 1 },
    maxRowsPerTable: { type: 'integer' as const, minimum: 1 },
  },
  additionalProperties: false,
};
