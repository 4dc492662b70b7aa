import type { TransitionHandle } from './catalogCache';
import { isRecord } from './schemaResolution';
import type { TransitionContext, TransitionTarget } from './transitions';

export type TransitionRef<T> =
  | { kind: 'byName'; name: string }
  | { kind: 'byNameAndRelation'; name: string; rel: string }
  | { kind: 'byNameAndParams'; name: string; params: TransitionContext }
  | { kind: 'byNameRelationParams'; name: string; rel: string; params: TransitionContext }
  | { kind: 'byHandle'; handle: TransitionHandle; rel?: string; params?: TransitionContext }
  | { kind: 'prebuilt'; value: T };

export type TransitionTuple =
  | [TransitionTarget, string]
  | [TransitionTarget, TransitionContext]
  | [TransitionTarget, string, TransitionContext];

/** Every shape a link, query or template may be declared with. */
export type TransitionDeclaration<T> = TransitionTarget | TransitionTuple | TransitionRef<T> | T;

const REF_KINDS: ReadonlySet<string> = new Set([
  'byName',
  'byNameAndRelation',
  'byNameAndParams',
  'byNameRelationParams',
  'byHandle',
  'prebuilt'
]);

export const ref = {
  byName: (name: string): TransitionRef<never> => ({ kind: 'byName', name }),
  byNameAndRelation: (name: string, rel: string): TransitionRef<never> => ({ kind: 'byNameAndRelation', name, rel }),
  byNameAndParams: (name: string, params: TransitionContext): TransitionRef<never> => ({
    kind: 'byNameAndParams',
    name,
    params
  }),
  byNameRelationParams: (name: string, rel: string, params: TransitionContext): TransitionRef<never> => ({
    kind: 'byNameRelationParams',
    name,
    rel,
    params
  }),
  byHandle: (handle: TransitionHandle, rel?: string, params?: TransitionContext): TransitionRef<never> => ({
    kind: 'byHandle',
    handle,
    rel,
    params
  }),
  prebuilt: <T>(value: T): TransitionRef<T> => ({ kind: 'prebuilt', value })
};

const isHandle = (value: unknown): value is TransitionHandle => typeof value === 'function';

const isTuple = (value: unknown): value is TransitionTuple =>
  Array.isArray(value) && (value.length === 2 || value.length === 3);

function isTransitionRef<T>(value: TransitionRef<T> | T): value is TransitionRef<T> {
  return isRecord(value) && typeof value.kind === 'string' && REF_KINDS.has(value.kind);
}

const fromTuple = <T>(tuple: TransitionTuple): TransitionRef<T> => {
  if (tuple.length === 3) {
    const [target, rel, params] = tuple;
    return typeof target === 'string' ? ref.byNameRelationParams(target, rel, params) : ref.byHandle(target, rel, params);
  }
  const [target, second] = tuple;
  if (typeof second === 'string') {
    return typeof target === 'string' ? ref.byNameAndRelation(target, second) : ref.byHandle(target, second);
  }
  return typeof target === 'string' ? ref.byNameAndParams(target, second) : ref.byHandle(target, undefined, second);
};

export function toTransitionRef<T>(declaration: TransitionDeclaration<T>): TransitionRef<T> {
  if (typeof declaration === 'string') {
    return ref.byName(declaration);
  }
  if (isHandle(declaration)) {
    return ref.byHandle(declaration);
  }
  if (isTuple(declaration)) {
    return fromTuple<T>(declaration);
  }
  if (isTransitionRef<T>(declaration)) {
    return declaration;
  }
  return ref.prebuilt(declaration);
}
