import type { ApiDescriptor } from '../src';

export const itemsDescriptor: ApiDescriptor = {
  paths: {
    '/items': {
      get: {
        operationId: 'listItems',
        summary: 'List items',
        tags: ['collection'],
        parameters: [{ name: 'status', in: 'query', schema: { type: 'string' } }]
      },
      post: {
        operationId: 'createItem',
        summary: 'Create item',
        tags: ['create'],
        requestBody: {
          content: {
            'application/json': {
              schema: {
                type: 'object',
                required: ['name'],
                properties: {
                  name: { type: 'string', title: 'Name' },
                  quantity: { type: 'integer', default: 1 },
                  urgent: { type: 'boolean' },
                  dueOn: { type: 'string' },
                  priority: { type: 'string', enum: ['low', 'high'], default: 'low' }
                }
              }
            }
          }
        }
      }
    },
    '/items/{item_id}': {
      get: { operationId: 'view_item', summary: 'View item', tags: ['item'] }
    },
    '/items/{item_id}/parts/{part_id}': {
      get: { operationId: 'view_part', summary: 'View part', tags: ['item'] }
    },
    '/a': { get: { operationId: 'op_a', summary: 'Operation A', tags: ['collection'] } },
    '/b': { post: { operationId: 'op_b', summary: 'Operation B', tags: ['edit'] } }
  }
};
