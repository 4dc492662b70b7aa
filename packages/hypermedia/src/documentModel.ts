import { z } from 'zod';

export const COLLECTION_JSON_MEDIA_TYPE = 'application/vnd.collection+json';
export const COLLECTION_JSON_VERSION = '1.0';

export type FieldValue =
  | string
  | number
  | boolean
  | Date
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

export const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.date(),
    z.null(),
    z.array(fieldValueSchema),
    z.record(z.string(), fieldValueSchema)
  ])
);

export const toFieldValue = (value: unknown): FieldValue => {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toFieldValue);
  }
  if (typeof value === 'object') {
    const result: { [key: string]: FieldValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toFieldValue(entry);
    }
    return result;
  }
  return String(value);
};

export const itemDataSchema = z.object({
  name: z.string().min(1),
  value: fieldValueSchema.default(null),
  prompt: z.string().optional(),
  type: z.string().optional(),
  inputType: z.string().optional(),
  renderHint: z.string().optional()
});

export const queryDataSchema = itemDataSchema.extend({
  options: z.array(z.string()).optional()
});

export const templateDataSchema = queryDataSchema.extend({
  required: z.boolean().default(false)
});

export const linkSchema = z.object({
  rel: z.string(),
  href: z.string(),
  prompt: z.string().optional(),
  render: z.string().optional(),
  mediaType: z.string().optional(),
  method: z.string().default('GET')
});

export const itemSchema = z.object({
  href: z.string(),
  rel: z.string().default('item'),
  data: z.array(itemDataSchema).default([]),
  links: z.array(linkSchema).default([])
});

export const querySchema = z.object({
  rel: z.string(),
  href: z.string(),
  prompt: z.string().optional(),
  name: z.string().optional(),
  data: z.array(queryDataSchema).default([])
});

export const collectionSchema = z.object({
  version: z.literal(COLLECTION_JSON_VERSION).default(COLLECTION_JSON_VERSION),
  href: z.string(),
  title: z.string(),
  links: z.array(linkSchema).default([]),
  items: z.array(itemSchema).default([]),
  queries: z.array(querySchema).default([])
});

export const templateSchema = z.object({
  name: z.string(),
  data: z.array(templateDataSchema).default([]),
  href: z.string().optional(),
  method: z.string().default('POST'),
  prompt: z.string().optional(),
  rel: z.string().optional()
});

export const documentErrorSchema = z.object({
  title: z.string(),
  code: z.number().int(),
  message: z.string(),
  details: z.string().optional()
});

export const collectionDocumentSchema = z.object({
  collection: collectionSchema,
  template: z.array(templateSchema).optional(),
  error: documentErrorSchema.optional()
});

export type ItemData = z.infer<typeof itemDataSchema>;
export type QueryData = z.infer<typeof queryDataSchema>;
export type TemplateData = z.infer<typeof templateDataSchema>;
export type Link = z.infer<typeof linkSchema>;
export type Item = z.infer<typeof itemSchema>;
export type Query = z.infer<typeof querySchema>;
export type Collection = z.infer<typeof collectionSchema>;
export type Template = z.infer<typeof templateSchema>;
export type DocumentError = z.infer<typeof documentErrorSchema>;
export type CollectionDocument = z.infer<typeof collectionDocumentSchema>;

export type CollectionInit = {
  href: string;
  title: string;
  links?: Link[];
  items?: Item[];
  queries?: Query[];
};

export function createCollection(init: CollectionInit): Collection {
  return {
    version: COLLECTION_JSON_VERSION,
    href: init.href,
    title: init.title,
    links: init.links ?? [],
    items: init.items ?? [],
    queries: init.queries ?? []
  };
}

/**
 * JSON shape written on the wire. `template` only appears when at least one
 * template exists and `error` only when the document carries one.
 */
export type CollectionJson = {
  collection: Collection;
  template?: Template[];
  error?: DocumentError;
};

function assignDefined<T extends object>(target: T, source: T, keys: ReadonlyArray<keyof T>): T {
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined) {
      target[key] = value;
    }
  }
  return target;
}

function compactLink(link: Link): Link {
  return assignDefined<Link>(
    { rel: link.rel, href: link.href, method: link.method },
    link,
    ['prompt', 'render', 'mediaType']
  );
}

function compactData<T extends ItemData>(entry: T, base: T): T {
  return assignDefined<T>(base, entry, ['prompt', 'type', 'inputType', 'renderHint']);
}

function compactItemData(entry: ItemData): ItemData {
  return compactData(entry, { name: entry.name, value: entry.value });
}

function compactQueryData(entry: QueryData): QueryData {
  const compacted = compactData<QueryData>(entry, { name: entry.name, value: entry.value });
  return assignDefined<QueryData>(compacted, entry, ['options']);
}

function compactTemplateData(entry: TemplateData): TemplateData {
  const compacted = compactData<TemplateData>(entry, {
    name: entry.name,
    value: entry.value,
    required: entry.required
  });
  return assignDefined<TemplateData>(compacted, entry, ['options']);
}

export function serializeDocument(document: CollectionDocument): CollectionJson {
  const { collection } = document;
  const serialized: CollectionJson = {
    collection: {
      version: collection.version,
      href: collection.href,
      title: collection.title,
      links: collection.links.map(compactLink),
      items: collection.items.map((item) => ({
        href: item.href,
        rel: item.rel,
        data: item.data.map(compactItemData),
        links: item.links.map(compactLink)
      })),
      queries: collection.queries.map((query) =>
        assignDefined<Query>(
          { rel: query.rel, href: query.href, data: query.data.map(compactQueryData) },
          query,
          ['prompt', 'name']
        )
      )
    }
  };

  if (document.template && document.template.length > 0) {
    serialized.template = document.template.map((template) =>
      assignDefined<Template>(
        { name: template.name, data: template.data.map(compactTemplateData), method: template.method },
        template,
        ['href', 'prompt', 'rel']
      )
    );
  }

  if (document.error) {
    serialized.error = assignDefined<DocumentError>(
      { title: document.error.title, code: document.error.code, message: document.error.message },
      document.error,
      ['details']
    );
  }

  return serialized;
}
