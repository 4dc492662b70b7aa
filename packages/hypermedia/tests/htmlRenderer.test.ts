import assert from 'node:assert/strict';
import { test } from 'node:test';

import { LiquidHtmlRenderer, formatFieldValue } from '../src';
import type { HtmlRenderContext } from '../src';

const baseContext: HtmlRenderContext = {
  title: 'Workflows',
  href: '/workflow-instances',
  links: [],
  items: [],
  queries: [],
  templates: []
};

test('links render as anchors or one-button forms', async () => {
  const html = await new LiquidHtmlRenderer().render({
    ...baseContext,
    links: [
      { rel: 'collection', href: '/workflow-instances', prompt: 'Instances', method: 'GET' },
      { rel: 'edit', href: '/workflow-instances/w1/archive', prompt: 'Archive', method: 'POST' }
    ]
  });

  assert.ok(html.includes('<a href="/workflow-instances" rel="collection">Instances</a>'));
  assert.ok(html.includes('<form class="link" action="/workflow-instances/w1/archive" method="post" data-method="POST">'));
  assert.ok(html.includes('<button type="submit" name="rel" value="edit">Archive</button>'));
});

test('items hide fields with the hidden render hint', async () => {
  const html = await new LiquidHtmlRenderer().render({
    ...baseContext,
    items: [
      {
        href: '/workflow-instances/w1',
        rel: 'item',
        data: [
          { name: 'id', value: 'w1', prompt: 'Id', renderHint: 'hidden' },
          { name: 'name', value: 'Onboarding', prompt: 'Name' },
          { name: 'dueDatetime', value: new Date('2026-01-02T03:04:05.000Z'), prompt: 'Due' }
        ],
        links: []
      }
    ]
  });

  assert.ok(html.includes('<a href="/workflow-instances/w1" rel="item">/workflow-instances/w1</a>'));
  assert.ok(html.includes('<dd data-name="name">Onboarding</dd>'));
  assert.ok(html.includes('<dd data-name="dueDatetime">2026-01-02T03:04:05.000Z</dd>'));
  assert.equal(html.includes('data-name="id"'), false);
});

test('output is escaped', async () => {
  const html = await new LiquidHtmlRenderer().render({ ...baseContext, title: '<b>Tasks & more</b>' });
  assert.ok(html.includes('<h1>&lt;b&gt;Tasks &amp; more&lt;/b&gt;</h1>'));
});

test('templates render inputs by type and render hint', async () => {
  const html = await new LiquidHtmlRenderer().render({
    ...baseContext,
    templates: [
      {
        name: 'saveWorkflowDefinition',
        href: '/workflow-definitions',
        method: 'POST',
        prompt: 'Save workflow',
        data: [
          { name: 'definitionId', value: 'd1', required: false, renderHint: 'hidden' },
          { name: 'name', value: null, required: true, inputType: 'text', prompt: 'Name' },
          { name: 'taskNames', value: null, required: true, inputType: 'text', renderHint: 'textarea' },
          { name: 'priority', value: 'high', required: false, inputType: 'select', options: ['low', 'high'] },
          { name: 'urgent', value: true, required: false, inputType: 'checkbox' }
        ]
      }
    ]
  });

  assert.ok(
    html.includes(
      '<form id="template-saveWorkflowDefinition" class="template" action="/workflow-definitions" method="post">'
    )
  );
  assert.ok(html.includes('<legend>Save workflow</legend>'));
  assert.ok(html.includes('<input type="hidden" name="definitionId" value="d1">'));
  assert.ok(html.includes('<label for="template-saveWorkflowDefinition-name">Name</label>'));
  assert.ok(
    html.includes('<input id="template-saveWorkflowDefinition-name" type="text" name="name" value="" required>')
  );
  assert.ok(
    html.includes('<textarea id="template-saveWorkflowDefinition-taskNames" name="taskNames" required></textarea>')
  );
  assert.ok(html.includes('<option value="high" selected>high</option>'));
  assert.ok(html.includes('<option value="low">low</option>'));
  assert.ok(
    html.includes(
      '<input id="template-saveWorkflowDefinition-urgent" type="checkbox" name="urgent" value="true" checked>'
    )
  );
});

test('queries render as GET forms', async () => {
  const html = await new LiquidHtmlRenderer().render({
    ...baseContext,
    queries: [
      {
        rel: 'collection',
        href: '/workflow-instances',
        prompt: 'Filter instances',
        data: [{ name: 'status', value: 'active', inputType: 'string', prompt: 'Status' }]
      }
    ]
  });

  assert.ok(html.includes('<form id="query-1" class="query" action="/workflow-instances" method="get">'));
  assert.ok(html.includes('<input id="query-1-status" type="string" name="status" value="active">'));
});

test('errors render their title and message', async () => {
  const html = await new LiquidHtmlRenderer().render({
    ...baseContext,
    error: { title: 'Not Found', code: 404, message: 'Workflow instance was not found' }
  });
  assert.ok(html.includes('<p class="error-code">404</p>'));
  assert.ok(html.includes('<p class="error-message">Workflow instance was not found</p>'));
});

test('formatFieldValue flattens values for display', () => {
  assert.equal(formatFieldValue(null), '');
  assert.equal(formatFieldValue(['a', 2]), 'a, 2');
  assert.equal(formatFieldValue({ a: 1 }), '{"a":1}');
  assert.equal(formatFieldValue(false), 'false');
});
