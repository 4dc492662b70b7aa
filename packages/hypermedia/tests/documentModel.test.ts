import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  COLLECTION_JSON_MEDIA_TYPE,
  collectionDocumentSchema,
  createCollection,
  serializeDocument,
  toFieldValue
} from '../src';

test('createCollection fills version and empty lists', () => {
  const collection = createCollection({ href: '/tasks', title: 'Tasks' });
  assert.deepEqual(collection, {
    version: '1.0',
    href: '/tasks',
    title: 'Tasks',
    links: [],
    items: [],
    queries: []
  });
  assert.equal(COLLECTION_JSON_MEDIA_TYPE, 'application/vnd.collection+json');
});

test('serializeDocument omits absent template, error and optional members', () => {
  const serialized = serializeDocument({
    collection: createCollection({
      href: '/tasks',
      title: 'Tasks',
      links: [{ rel: 'self', href: '/tasks', method: 'GET', prompt: undefined }]
    }),
    template: []
  });

  assert.deepEqual(serialized, {
    collection: {
      version: '1.0',
      href: '/tasks',
      title: 'Tasks',
      links: [{ rel: 'self', href: '/tasks', method: 'GET' }],
      items: [],
      queries: []
    }
  });
  assert.equal('template' in serialized, false);
  assert.equal('error' in serialized, false);
});

test('serializeDocument keeps templates and errors when present', () => {
  const serialized = serializeDocument({
    collection: createCollection({ href: '/tasks', title: 'Tasks' }),
    template: [
      {
        name: 'createTask',
        href: '/tasks',
        method: 'POST',
        data: [{ name: 'title', value: null, required: true, inputType: 'text' }]
      }
    ],
    error: { title: 'Not Found', code: 404, message: 'Task was not found' }
  });

  assert.deepEqual(serialized.template, [
    {
      name: 'createTask',
      href: '/tasks',
      method: 'POST',
      data: [{ name: 'title', value: null, required: true, inputType: 'text' }]
    }
  ]);
  assert.deepEqual(serialized.error, { title: 'Not Found', code: 404, message: 'Task was not found' });
});

test('collectionDocumentSchema applies wire defaults', () => {
  const parsed = collectionDocumentSchema.parse({
    collection: {
      href: '/tasks',
      title: 'Tasks',
      items: [{ href: '/tasks/1', data: [{ name: 'title' }] }],
      links: [{ rel: 'self', href: '/tasks' }]
    },
    template: [{ name: 'createTask', data: [{ name: 'title' }] }]
  });

  assert.equal(parsed.collection.version, '1.0');
  assert.equal(parsed.collection.items[0].rel, 'item');
  assert.equal(parsed.collection.items[0].data[0].value, null);
  assert.equal(parsed.collection.links[0].method, 'GET');
  assert.equal(parsed.template?.[0].method, 'POST');
  assert.equal(parsed.template?.[0].data[0].required, false);
});

test('collectionDocumentSchema rejects a foreign version', () => {
  const result = collectionDocumentSchema.safeParse({
    collection: { version: '2.0', href: '/tasks', title: 'Tasks' }
  });
  assert.equal(result.success, false);
});

test('toFieldValue converts arbitrary values', () => {
  const due = new Date('2026-01-02T03:04:05.000Z');
  assert.equal(toFieldValue(undefined), null);
  assert.equal(toFieldValue(due), due);
  assert.equal(toFieldValue(BigInt(12)), '12');
  assert.deepEqual(toFieldValue({ count: 2, tags: ['a', undefined] }), { count: 2, tags: ['a', null] });
});
