import assert from 'node:assert/strict';
import { test } from 'node:test';

import { MissingParameterError } from '@cjkit/hypermedia';
import { z } from 'zod';

import { WorkflowConflictError, WorkflowNotFoundError, WorkflowValidationError } from '../src/domain/errors';
import { mapErrorToResponse, toDocumentError } from '../src/errors';

test('domain errors map to their status codes', () => {
  assert.deepEqual(mapErrorToResponse(new WorkflowNotFoundError('Task', 'task_1')), {
    statusCode: 404,
    title: 'not_found',
    message: 'Task task_1 was not found'
  });
  assert.equal(mapErrorToResponse(new WorkflowConflictError('busy')).statusCode, 409);
  assert.deepEqual(mapErrorToResponse(new WorkflowValidationError('bad name', ['name'])), {
    statusCode: 422,
    title: 'validation_failed',
    message: 'bad name',
    details: ['name']
  });
});

test('zod errors become bad requests', () => {
  const result = z.object({ name: z.string() }).safeParse({});
  assert.equal(result.success, false);
  if (!result.success) {
    const mapped = mapErrorToResponse(result.error);
    assert.equal(mapped.statusCode, 400);
    assert.equal(mapped.message, 'Request validation failed');
  }
});

test('missing transition parameters are server errors', () => {
  const mapped = mapErrorToResponse(new MissingParameterError('taskId', 'completeTask', '/tasks/{taskId}/complete'));
  assert.equal(mapped.statusCode, 500);
  assert.equal(mapped.title, 'missing_transition_parameter');
  assert.equal(
    mapped.message,
    "Missing parameter 'taskId' for transition 'completeTask' with href '/tasks/{taskId}/complete'"
  );
});

test('unknown errors hide their message', () => {
  assert.deepEqual(mapErrorToResponse(new Error('database password leaked')), {
    statusCode: 500,
    title: 'internal_error',
    message: 'Unexpected error'
  });
});

test('details are serialized into the error document', () => {
  assert.deepEqual(
    toDocumentError({ statusCode: 422, title: 'validation_failed', message: 'bad name', details: ['name'] }),
    { title: 'validation_failed', code: 422, message: 'bad name', details: '[\n  "name"\n]' }
  );
});
