import { toFieldValue } from './documentModel';
import type { Item, ItemData, Link } from './documentModel';
import { readSchemaType } from './schemaResolution';

export interface PropertyShape {
  readonly type?: string | readonly string[];
  readonly title?: string;
  readonly 'x-render-hint'?: string;
  readonly [keyword: string]: unknown;
}

/** JSON-schema object shape; the order of `properties` is the field order. */
export interface RecordShape {
  readonly type?: string;
  readonly properties: Readonly<Record<string, PropertyShape>>;
  readonly [keyword: string]: unknown;
}

export interface ProjectRecordOptions {
  shape?: RecordShape;
  href?: string;
  links?: Link[];
  rel?: string;
}

export const humanizeFieldName = (name: string): string =>
  name
    .replace(/_/g, ' ')
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .split(' ')
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');

const runtimeType = (value: unknown): string | undefined => {
  if (value === null || value === undefined) {
    return undefined;
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return typeof value;
  }
  if (value instanceof Date) {
    return 'string';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value === 'object' ? 'object' : 'string';
};

export function inferRecordShape(record: object): RecordShape {
  const properties: Record<string, PropertyShape> = {};
  for (const [name, value] of Object.entries(record)) {
    const type = runtimeType(value);
    properties[name] = type ? { type } : {};
  }
  return { type: 'object', properties };
}

export function projectRecord(record: object, options: ProjectRecordOptions = {}): Item {
  const shape = options.shape ?? inferRecordShape(record);
  const data = Object.entries(shape.properties).map(([name, property]): ItemData => {
    const value: unknown = Reflect.get(record, name);
    const entry: ItemData = {
      name,
      value: toFieldValue(value),
      prompt: property.title || humanizeFieldName(name)
    };
    const type = readSchemaType(property);
    if (type) {
      entry.type = type;
    }
    const renderHint = property['x-render-hint'];
    if (renderHint) {
      entry.renderHint = renderHint;
    }
    return entry;
  });

  return {
    href: options.href ?? '',
    rel: options.rel ?? 'item',
    data,
    links: options.links ?? []
  };
}
