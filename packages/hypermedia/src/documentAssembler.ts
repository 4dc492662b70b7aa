import { createCollection } from './documentModel';
import type { CollectionDocument, DocumentError, Item, Link, Query, Template } from './documentModel';
import { projectRecord } from './recordProjector';
import type { RecordShape } from './recordProjector';
import { toTransitionRef } from './transitionRefs';
import type { TransitionDeclaration, TransitionRef } from './transitionRefs';
import type {
  ResolvedTransition,
  TransitionContext,
  TransitionResolver,
  TransitionTarget
} from './transitions';

export const PREBUILT_ITEM: unique symbol = Symbol('prebuiltItem');

/** An Item the caller built itself; it is placed in the document as is. */
export interface PrebuiltItem {
  readonly [PREBUILT_ITEM]: Item;
}

export const prebuiltItem = (item: Item): PrebuiltItem => ({ [PREBUILT_ITEM]: item });

const isPrebuiltItem = (value: object): value is PrebuiltItem => PREBUILT_ITEM in value;

export interface BuildDocumentInput<R extends object = object> {
  title: string;
  href?: string;
  /** Records are projected; built items must be wrapped with `prebuiltItem`. */
  items?: ReadonlyArray<PrebuiltItem | R>;
  itemHref?: (record: R) => string;
  itemShape?: RecordShape;
  links?: ReadonlyArray<TransitionDeclaration<Link>>;
  queries?: ReadonlyArray<TransitionDeclaration<Query>>;
  templates?: ReadonlyArray<TransitionDeclaration<Template>>;
  error?: DocumentError;
}

type Convert<T> = (transition: ResolvedTransition, rel: string | undefined) => T;

const toLink: Convert<Link> = (transition, rel) => transition.toLink(rel);

const toQuery: Convert<Query> = (transition, rel) => {
  const query = transition.toQuery();
  if (rel) {
    query.rel = rel;
  }
  return query;
};

const toTemplate: Convert<Template> = (transition, rel) => {
  const template = transition.toTemplate();
  if (rel) {
    template.rel = rel;
  }
  return template;
};

/**
 * Request-scoped document builder. Transition declarations are resolved
 * against the application's catalog; ones that name no known operation are
 * left out of the document.
 */
export class Hypermedia {
  constructor(
    private readonly resolver: TransitionResolver,
    readonly requestUrl: string
  ) {}

  transition(target: TransitionTarget, context: TransitionContext = {}): ResolvedTransition | undefined {
    return this.resolver.resolve(target, context);
  }

  buildDocument<R extends object>(input: BuildDocumentInput<R>): CollectionDocument {
    const items = (input.items ?? []).map((record) => {
      if (isPrebuiltItem(record)) {
        return record[PREBUILT_ITEM];
      }
      return projectRecord(record, {
        shape: input.itemShape,
        href: input.itemHref ? input.itemHref(record) : ''
      });
    });

    const collection = createCollection({
      href: input.href || this.requestUrl,
      title: input.title,
      items,
      links: this.resolveAll(input.links, toLink),
      queries: this.resolveAll(input.queries, toQuery)
    });

    const document: CollectionDocument = { collection };
    const templates = this.resolveAll(input.templates, toTemplate);
    if (templates.length > 0) {
      document.template = templates;
    }
    if (input.error) {
      document.error = input.error;
    }
    return document;
  }

  private resolveAll<T>(declarations: ReadonlyArray<TransitionDeclaration<T>> | undefined, convert: Convert<T>): T[] {
    const resolved: T[] = [];
    for (const declaration of declarations ?? []) {
      const value = this.resolveRef(toTransitionRef<T>(declaration), convert);
      if (value !== undefined) {
        resolved.push(value);
      }
    }
    return resolved;
  }

  private resolveRef<T>(reference: TransitionRef<T>, convert: Convert<T>): T | undefined {
    switch (reference.kind) {
      case 'prebuilt':
        return reference.value;
      case 'byName':
        return this.convertTransition(reference.name, {}, undefined, convert);
      case 'byNameAndRelation':
        return this.convertTransition(reference.name, {}, reference.rel, convert);
      case 'byNameAndParams':
        return this.convertTransition(reference.name, reference.params, undefined, convert);
      case 'byNameRelationParams':
        return this.convertTransition(reference.name, reference.params, reference.rel, convert);
      case 'byHandle':
        return this.convertTransition(reference.handle, reference.params ?? {}, reference.rel, convert);
      default: {
        const exhaustive: never = reference;
        return exhaustive;
      }
    }
  }

  private convertTransition<T>(
    target: TransitionTarget,
    context: TransitionContext,
    rel: string | undefined,
    convert: Convert<T>
  ): T | undefined {
    const transition = this.resolver.resolve(target, context);
    return transition ? convert(transition, rel) : undefined;
  }
}
