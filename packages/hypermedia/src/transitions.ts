import { toFieldValue } from './documentModel';
import type { Link, Query, QueryData, Template, TemplateData } from './documentModel';
import type { TransitionCatalog, TransitionHandle } from './catalogCache';
import { MissingParameterError } from './errors';
import type { OperationEntry } from './operationCatalog';

export type TransitionContext = Readonly<Record<string, string | number | undefined>>;

export type TransitionTarget = string | TransitionHandle;

const PLACEHOLDER_PATTERN = /\{([^{}]+)\}/g;

export function substitutePathTemplate(
  entry: Pick<OperationEntry, 'operationId' | 'pathTemplate'>,
  context: TransitionContext
): string {
  return entry.pathTemplate.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    const value = Object.prototype.hasOwnProperty.call(context, name) ? context[name] : undefined;
    if (value === undefined) {
      throw new MissingParameterError(name, entry.operationId, entry.pathTemplate);
    }
    return String(value);
  });
}

const normalizeDefault = (value: unknown): unknown => {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object' && value !== null) {
    const primitive: unknown = value.valueOf();
    if (primitive !== value) {
      return primitive;
    }
  }
  return value;
};

const isPlainObject = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/** Empty strings, zero, false, null and empty lists or mappings leave a field's default alone. */
const isBlankDefault = (value: unknown): boolean => {
  if (!value) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  if (typeof value === 'object' && isPlainObject(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
};

const toQueryData = (field: TemplateData): QueryData => {
  const { required: _required, ...data } = field;
  return data;
};

/**
 * An operation entry bound to concrete parameters. Conversions never touch the
 * entry, so each may be called any number of times.
 */
export class ResolvedTransition {
  constructor(
    private readonly entry: OperationEntry,
    readonly href: string
  ) {}

  get operationId(): string {
    return this.entry.operationId;
  }

  get method(): string {
    return this.entry.method;
  }

  get rel(): string {
    return this.entry.rel;
  }

  get title(): string {
    return this.entry.title;
  }

  toLink(rel?: string): Link {
    return {
      rel: rel || this.entry.rel,
      href: this.href,
      prompt: this.entry.title,
      method: this.entry.method
    };
  }

  toQuery(): Query {
    return {
      rel: this.entry.rel,
      href: this.href,
      prompt: this.entry.title,
      data: structuredClone(this.entry.fields).map(toQueryData)
    };
  }

  /**
   * Builds a submission form. A default replaces a field's schema default
   * only when its normalized value is not blank.
   */
  toTemplate(defaults: Readonly<Record<string, unknown>> = {}): Template {
    const data = structuredClone(this.entry.fields).map((field) => {
      const override = Object.prototype.hasOwnProperty.call(defaults, field.name)
        ? normalizeDefault(defaults[field.name])
        : undefined;
      if (!isBlankDefault(override)) {
        field.value = toFieldValue(override);
      }
      return field;
    });
    return {
      name: this.entry.operationId,
      data,
      prompt: this.entry.title,
      href: this.href,
      method: this.entry.method,
      rel: this.entry.rel
    };
  }
}

export class TransitionResolver {
  constructor(private readonly catalog: TransitionCatalog) {}

  /**
   * Looks a transition up by operation id or handler and fills its path
   * placeholders from `context`. Unknown targets resolve to `undefined`.
   */
  resolve(target: TransitionTarget, context: TransitionContext = {}): ResolvedTransition | undefined {
    const operationId = typeof target === 'string' ? target : this.catalog.operationIdFor(target);
    if (!operationId) {
      return undefined;
    }
    const entry = this.catalog.get(operationId);
    if (!entry) {
      return undefined;
    }
    const copy = structuredClone(entry);
    return new ResolvedTransition(copy, substitutePathTemplate(copy, context));
  }
}
