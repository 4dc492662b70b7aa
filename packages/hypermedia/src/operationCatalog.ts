import type { BaseLogger } from 'pino';

import { toFieldValue } from './documentModel';
import type { TemplateData } from './documentModel';
import { dereference, isRecord, readSchemaType, readString } from './schemaResolution';
import type { ApiDescriptor, SchemaObject } from './schemaResolution';

const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const;

const JSON_MEDIA_TYPE = 'application/json';
const FORM_MEDIA_TYPE = 'application/x-www-form-urlencoded';

export interface OperationEntry {
  operationId: string;
  pathTemplate: string;
  method: string;
  tags: string;
  rel: string;
  title: string;
  fields: TemplateData[];
}

export interface OperationCatalogOptions {
  logger?: Pick<BaseLogger, 'debug'>;
}

interface ParameterObject {
  name: string;
  in: string;
  required: boolean;
  description?: string;
  schema: SchemaObject;
}

export function inputTypeFor(type: string, hasOptions: boolean): string {
  if (type === 'boolean') {
    return 'checkbox';
  }
  if (type === 'integer' || type === 'number') {
    return 'number';
  }
  if (type === 'string') {
    return hasOptions ? 'select' : 'text';
  }
  return type;
}

const readParameters = (descriptor: ApiDescriptor, value: unknown): ParameterObject[] => {
  if (!Array.isArray(value)) {
    return [];
  }
  const parameters: ParameterObject[] = [];
  for (const candidate of value) {
    const parameter = dereference(descriptor, candidate);
    if (!parameter) {
      continue;
    }
    const name = readString(parameter.name);
    const location = readString(parameter.in);
    if (!name || !location) {
      continue;
    }
    parameters.push({
      name,
      in: location,
      required: parameter.required === true,
      description: readString(parameter.description),
      schema: dereference(descriptor, parameter.schema) ?? {}
    });
  }
  return parameters;
};

const mergeParameters = (shared: ParameterObject[], own: ParameterObject[]): ParameterObject[] => {
  const merged = new Map<string, ParameterObject>();
  for (const parameter of [...shared, ...own]) {
    merged.set(`${parameter.in}:${parameter.name}`, parameter);
  }
  return Array.from(merged.values());
};

const queryField = (parameter: ParameterObject): TemplateData => {
  const type = readSchemaType(parameter.schema) ?? 'string';
  return {
    name: parameter.name,
    value: toFieldValue(parameter.schema.default),
    type,
    inputType: type,
    required: parameter.required,
    prompt: parameter.description ?? readString(parameter.schema.description) ?? parameter.name
  };
};

const referencedSchema = (descriptor: ApiDescriptor, property: SchemaObject): SchemaObject | undefined => {
  if (typeof property.$ref === 'string') {
    return dereference(descriptor, property);
  }
  const { allOf } = property;
  if (Array.isArray(allOf) && allOf.length > 0) {
    const [first] = allOf;
    if (isRecord(first) && typeof first.$ref === 'string') {
      return dereference(descriptor, first);
    }
  }
  return undefined;
};

const bodyField = (
  descriptor: ApiDescriptor,
  name: string,
  propertyValue: unknown,
  requiredNames: readonly string[]
): TemplateData => {
  const property = isRecord(propertyValue) ? propertyValue : {};
  let type = readSchemaType(property) ?? 'string';
  let enumValues = property.enum;

  const referenced = referencedSchema(descriptor, property);
  if (referenced) {
    enumValues = referenced.enum;
    type = readSchemaType(referenced) ?? type;
  }

  const options = Array.isArray(enumValues) ? enumValues.map((option) => String(option)) : undefined;
  const field: TemplateData = {
    name,
    value: toFieldValue(property.default),
    type,
    inputType: inputTypeFor(type, options !== undefined && options.length > 0),
    required: requiredNames.includes(name),
    prompt: readString(property.title) ?? name
  };
  if (options) {
    field.options = options;
  }
  const renderHint = readString(property['x-render-hint']);
  if (renderHint) {
    field.renderHint = renderHint;
  }
  return field;
};

const requestBodySchema = (descriptor: ApiDescriptor, value: unknown): SchemaObject | undefined => {
  const requestBody = dereference(descriptor, value);
  if (!requestBody || !isRecord(requestBody.content)) {
    return undefined;
  }
  const { content } = requestBody;
  const media = isRecord(content[JSON_MEDIA_TYPE]) ? content[JSON_MEDIA_TYPE] : content[FORM_MEDIA_TYPE];
  if (!isRecord(media)) {
    return undefined;
  }
  return dereference(descriptor, media.schema);
};

const readTags = (value: unknown): string =>
  Array.isArray(value) ? value.filter((tag): tag is string => typeof tag === 'string').join(' ') : '';

/**
 * Derives one entry per named operation of the descriptor. Query parameters
 * and request-body properties become template fields; path parameters stay in
 * the path template for the resolver to fill.
 */
export function buildOperationCatalog(
  descriptor: ApiDescriptor,
  options: OperationCatalogOptions = {}
): Map<string, OperationEntry> {
  const { logger } = options;
  const catalog = new Map<string, OperationEntry>();

  for (const [pathTemplate, pathItemValue] of Object.entries(descriptor.paths ?? {})) {
    const pathItem = dereference(descriptor, pathItemValue);
    if (!pathItem) {
      continue;
    }
    const sharedParameters = readParameters(descriptor, pathItem.parameters);

    for (const method of HTTP_METHODS) {
      const operation = pathItem[method];
      if (!isRecord(operation)) {
        continue;
      }
      const operationId = readString(operation.operationId);
      if (!operationId) {
        logger?.debug({ path: pathTemplate, method: method.toUpperCase() }, 'skipping operation without operationId');
        continue;
      }

      const parameters = mergeParameters(sharedParameters, readParameters(descriptor, operation.parameters));
      const fields = parameters.filter((parameter) => parameter.in === 'query').map(queryField);

      if (operation.requestBody !== undefined) {
        const schema = requestBodySchema(descriptor, operation.requestBody);
        if (schema && isRecord(schema.properties)) {
          const requiredNames = Array.isArray(schema.required)
            ? schema.required.filter((name): name is string => typeof name === 'string')
            : [];
          for (const [name, property] of Object.entries(schema.properties)) {
            fields.push(bodyField(descriptor, name, property, requiredNames));
          }
        } else {
          logger?.debug({ operationId }, 'request body schema has no object properties; no fields derived');
        }
      }

      const tags = readTags(operation.tags);
      catalog.set(operationId, {
        operationId,
        pathTemplate,
        method: method.toUpperCase(),
        tags,
        rel: tags,
        title: readString(operation.summary) ?? '',
        fields
      });
    }
  }

  logger?.debug({ operations: catalog.size }, 'transition catalog built');
  return catalog;
}
