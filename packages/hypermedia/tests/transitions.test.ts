import assert from 'node:assert/strict';
import { test } from 'node:test';

import { MissingParameterError, TransitionCatalog, TransitionResolver, substitutePathTemplate } from '../src';
import { itemsDescriptor } from './fixtures';

const createResolver = () => {
  const catalog = new TransitionCatalog(() => itemsDescriptor);
  return { catalog, resolver: new TransitionResolver(catalog) };
};

test('operations without placeholders resolve to their path template', () => {
  const { resolver } = createResolver();
  assert.equal(resolver.resolve('listItems')?.href, '/items');
  assert.equal(resolver.resolve('listItems', { unused: 'x' })?.href, '/items');
});

test('placeholders are filled from the context', () => {
  const { resolver } = createResolver();
  assert.equal(resolver.resolve('view_item', { item_id: '42' })?.href, '/items/42');
  assert.equal(resolver.resolve('view_item', { item_id: 42, extra: 'ignored' })?.href, '/items/42');
  assert.equal(resolver.resolve('view_part', { item_id: 'i1', part_id: 'p2' })?.href, '/items/i1/parts/p2');
});

test('a missing placeholder raises MissingParameterError', () => {
  const { resolver } = createResolver();
  assert.throws(
    () => resolver.resolve('view_item', {}),
    (error: unknown) => {
      assert.ok(error instanceof MissingParameterError);
      assert.equal(error.parameter, 'item_id');
      assert.equal(error.operationId, 'view_item');
      assert.equal(error.pathTemplate, '/items/{item_id}');
      assert.equal(error.code, 'MISSING_PARAMETER');
      assert.equal(error.message, "Missing parameter 'item_id' for transition 'view_item' with href '/items/{item_id}'");
      return true;
    }
  );
  assert.throws(
    () => resolver.resolve('view_part', { item_id: 'i1', part_id: undefined }),
    (error: unknown) => error instanceof MissingParameterError && error.parameter === 'part_id'
  );
});

test('unknown names and handles resolve to undefined', () => {
  const { resolver } = createResolver();
  const unregistered = () => undefined;
  assert.equal(resolver.resolve('nope'), undefined);
  assert.equal(resolver.resolve(unregistered), undefined);
});

test('registered handles resolve like their operation id', () => {
  const { catalog, resolver } = createResolver();
  function viewItem(): void {}
  catalog.registerHandle(viewItem, 'view_item');
  assert.equal(resolver.resolve(viewItem, { item_id: '7' })?.href, '/items/7');
});

test('conversions are repeatable and leave the catalog untouched', () => {
  const { catalog, resolver } = createResolver();
  const before = structuredClone(catalog.get('createItem'));
  const transition = resolver.resolve('createItem');
  assert.ok(transition);

  assert.deepEqual(transition.toLink(), transition.toLink());
  assert.deepEqual(transition.toQuery(), transition.toQuery());
  const first = transition.toTemplate({ name: 'Widget' });
  first.data[0].value = 'mutated';
  assert.deepEqual(transition.toTemplate({ name: 'Widget' }).data[0].value, 'Widget');
  assert.deepEqual(catalog.get('createItem'), before);
});

test('toLink prefers the given relation', () => {
  const { resolver } = createResolver();
  const transition = resolver.resolve('view_item', { item_id: '1' });
  assert.ok(transition);
  assert.deepEqual(transition.toLink(), { rel: 'item', href: '/items/1', prompt: 'View item', method: 'GET' });
  assert.equal(transition.toLink('self').rel, 'self');
  assert.equal(transition.toLink('').rel, 'item');
});

test('toQuery drops the required flag', () => {
  const { resolver } = createResolver();
  const query = resolver.resolve('listItems')?.toQuery();
  assert.deepEqual(query, {
    rel: 'collection',
    href: '/items',
    prompt: 'List items',
    data: [{ name: 'status', value: null, type: 'string', inputType: 'string', prompt: 'status' }]
  });
});

test('template defaults override only when truthy', () => {
  const { resolver } = createResolver();
  const transition = resolver.resolve('createItem');
  assert.ok(transition);

  const kept = transition.toTemplate({ name: '', quantity: 0, urgent: false, priority: null });
  assert.deepEqual(
    kept.data.map((field) => field.value),
    [null, 1, null, null, 'low']
  );

  const emptyCollections = transition.toTemplate({ name: {}, priority: [] });
  assert.deepEqual(
    emptyCollections.data.map((field) => field.value),
    [null, 1, null, null, 'low']
  );

  const overridden = transition.toTemplate({
    name: 'Widget',
    quantity: 5,
    urgent: true,
    dueOn: new Date('2026-03-01T00:00:00.000Z'),
    priority: { valueOf: () => 'high' }
  });
  assert.deepEqual(
    overridden.data.map((field) => field.value),
    ['Widget', 5, true, '2026-03-01T00:00:00.000Z', 'high']
  );
  assert.equal(overridden.name, 'createItem');
  assert.equal(overridden.href, '/items');
  assert.equal(overridden.method, 'POST');
  assert.equal(overridden.rel, 'create');
  assert.equal(overridden.prompt, 'Create item');
});

test('the catalog is built once until invalidated', () => {
  let builds = 0;
  const catalog = new TransitionCatalog(() => {
    builds += 1;
    return itemsDescriptor;
  });
  const first = catalog.entries();
  assert.equal(catalog.entries(), first);
  assert.equal(builds, 1);

  catalog.invalidate();
  assert.notEqual(catalog.entries(), first);
  assert.equal(builds, 2);
});

test('substitutePathTemplate replaces every placeholder', () => {
  assert.equal(
    substitutePathTemplate({ operationId: 'x', pathTemplate: '/{a}/{b}/{a}' }, { a: 1, b: 'two' }),
    '/1/two/1'
  );
});
