/**
 * Minimal view of an OpenAPI document. Only `paths` and the targets of local
 * `$ref` pointers are read, so 3.0 and 3.1 documents both fit.
 */
export interface ApiDescriptor {
  readonly paths?: Readonly<Record<string, unknown>>;
  readonly components?: unknown;
}

export type SchemaObject = Record<string, unknown>;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const readString = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

const decodePointerSegment = (segment: string): string =>
  segment.replace(/~1/g, '/').replace(/~0/g, '~');

export function resolveSchemaRef(descriptor: ApiDescriptor, pointer: string): SchemaObject | undefined {
  if (!pointer.startsWith('#')) {
    return undefined;
  }
  const fragment = pointer.slice(1);
  if (fragment !== '' && !fragment.startsWith('/')) {
    return undefined;
  }

  let current: unknown = descriptor;
  const segments = fragment === '' ? [] : fragment.slice(1).split('/').map(decodePointerSegment);
  for (const segment of segments) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isRecord(current)) {
      current = Object.prototype.hasOwnProperty.call(current, segment) ? current[segment] : undefined;
    } else {
      return undefined;
    }
  }
  return isRecord(current) ? current : undefined;
}

/**
 * Returns the object itself, or the target of its `$ref` when it is a
 * reference. Only one hop is followed.
 */
export function dereference(descriptor: ApiDescriptor, value: unknown): SchemaObject | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const ref = value.$ref;
  if (typeof ref === 'string') {
    return resolveSchemaRef(descriptor, ref);
  }
  return value;
}

/** First non-null member of a JSON-schema `type`, which may be a list. */
export function readSchemaType(schema: SchemaObject): string | undefined {
  const { type } = schema;
  if (typeof type === 'string') {
    return type;
  }
  if (Array.isArray(type)) {
    return type.find((member): member is string => typeof member === 'string' && member !== 'null');
  }
  return undefined;
}
