import assert from 'node:assert/strict';
import { test } from 'node:test';

import { Representor, createCollection } from '../src';
import type { CollectionDocument, HtmlRenderContext, HtmlRenderer } from '../src';

class RecordingRenderer implements HtmlRenderer {
  readonly contexts: HtmlRenderContext[] = [];

  async render(context: HtmlRenderContext): Promise<string> {
    this.contexts.push(context);
    return `<h1>${context.title}</h1>`;
  }
}

const document: CollectionDocument = {
  collection: createCollection({
    href: '/items',
    title: 'Items',
    links: [{ rel: 'self', href: '/items', method: 'GET' }]
  })
};

test('collection+json wins whenever it is listed', async () => {
  const representor = new Representor(new RecordingRenderer());

  for (const accept of ['text/html, application/vnd.collection+json', 'application/vnd.collection+json, text/html']) {
    const response = await representor.represent(document, accept);
    assert.equal(response.representation, 'collection+json');
    assert.equal(response.contentType, 'application/vnd.collection+json');
    assert.deepEqual(JSON.parse(response.body), {
      collection: {
        version: '1.0',
        href: '/items',
        title: 'Items',
        links: [{ rel: 'self', href: '/items', method: 'GET' }],
        items: [],
        queries: []
      }
    });
  }
});

test('other accept values fall back to html', async () => {
  const renderer = new RecordingRenderer();
  const representor = new Representor(renderer);

  const response = await representor.represent(document, 'application/json');
  assert.deepEqual(response, {
    representation: 'html',
    contentType: 'text/html; charset=utf-8',
    body: '<h1>Items</h1>'
  });
  assert.deepEqual(renderer.contexts[0], {
    title: 'Items',
    href: '/items',
    links: [{ rel: 'self', href: '/items', method: 'GET' }],
    items: [],
    queries: [],
    templates: [],
    error: undefined
  });

  assert.equal((await representor.represent(document, undefined)).representation, 'html');
  assert.equal((await representor.represent(document, 'application/vnd.collection+json;q=0.9')).representation, 'html');
});

test('a custom media type is matched instead of the default', async () => {
  const representor = new Representor(new RecordingRenderer(), 'application/vnd.example+json');
  const response = await representor.represent(document, 'application/vnd.example+json');
  assert.equal(response.contentType, 'application/vnd.example+json');
  assert.equal(representor.acceptsCollectionJson('application/vnd.collection+json'), false);
});

test('renderer failures propagate', async () => {
  const representor = new Representor({
    render: async () => {
      throw new Error('template exploded');
    }
  });
  await assert.rejects(representor.represent(document, 'text/html'), /template exploded/);
});
