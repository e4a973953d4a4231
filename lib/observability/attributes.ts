type Primitive = string | number | boolean;
type AttributeInput = Primitive | Primitive[] | Date | null | undefined;
export type SpanAttributesInput = Record<string, AttributeInput>;
export type SpanAttributeRecord = Record<string, Primitive | Primitive[]>;

const MAX_STRING_LENGTH = 256;

export const sanitizeString = (value: string) => value.slice(0, MAX_STRING_LENGTH);

const sanitizePrimitive = (value: unknown): Primitive | undefined => {
  if (typeof value === 'string') return sanitizeString(value);
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'boolean') return value;
  if (value instanceof Date && Number.isFinite(value.getTime())) {
    return sanitizeString(value.toISOString());
  }
  return undefined;
};

const sanitizeAttributeValue = (value: AttributeInput): Primitive | Primitive[] | undefined => {
  if (value == null) return undefined;
  if (Array.isArray(value)) {
    const sanitized: Primitive[] = [];
    for (const item of value) {
      const primitive = sanitizePrimitive(item);
      if (primitive !== undefined) sanitized.push(primitive);
    }
    return sanitized.length ? sanitized : undefined;
  }
  return sanitizePrimitive(value);
};

export const sanitizeAttributes = (
  attributes?: SpanAttributesInput,
): SpanAttributeRecord | undefined => {
  if (!attributes) return undefined;
  const sanitized: SpanAttributeRecord = {};
  for (const [key, value] of Object.entries(attributes)) {
    const primitive = sanitizeAttributeValue(value);
    if (primitive !== undefined) {
      sanitized[key] = primitive;
    }
  }
  return Object.keys(sanitized).length ? sanitized : undefined;
};

