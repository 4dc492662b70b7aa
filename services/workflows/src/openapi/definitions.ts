import type { RecordShape } from '@cjkit/hypermedia';

import { workflowStatusSchema } from '../domain/models';

export const definitionIdParams = {
  type: 'object',
  required: ['definitionId'],
  properties: {
    definitionId: { type: 'string' }
  }
} as const;

export const instanceIdParams = {
  type: 'object',
  required: ['instanceId'],
  properties: {
    instanceId: { type: 'string' }
  }
} as const;

export const taskIdParams = {
  type: 'object',
  required: ['taskId'],
  properties: {
    taskId: { type: 'string' }
  }
} as const;

export const workflowInstanceQuery = {
  type: 'object',
  properties: {
    status: {
      type: 'string',
      description: 'Status',
      enum: [...workflowStatusSchema.options, '']
    },
    definitionId: { type: 'string', description: 'Workflow definition' }
  }
} as const;

export const saveWorkflowDefinitionBody = {
  type: 'object',
  required: ['name'],
  properties: {
    id: { type: 'string', title: 'Id', 'x-render-hint': 'hidden' },
    name: { type: 'string', title: 'Name' },
    description: { type: 'string', title: 'Description', 'x-render-hint': 'textarea' },
    taskDefinitions: { type: 'string', title: 'Tasks (one per line)', 'x-render-hint': 'textarea' }
  }
} as const;

export const addTaskDefinitionBody = {
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string', title: 'Task name' },
    dueDatetimeOffsetMinutes: { type: 'integer', title: 'Due offset (minutes)', default: 0 }
  }
} as const;

export const createWorkflowInstanceBody = {
  type: 'object',
  properties: {
    name: { type: 'string', title: 'Instance name' },
    dueDatetime: { type: 'string', title: 'Due date' }
  }
} as const;

export const workflowDefinitionShape: RecordShape = {
  type: 'object',
  properties: {
    name: { type: 'string', title: 'Name' },
    description: { type: 'string', title: 'Description' },
    dueDatetime: { type: ['string', 'null'], title: 'Due' }
  }
};

export const taskDefinitionShape: RecordShape = {
  type: 'object',
  properties: {
    order: { type: 'integer', title: '#' },
    name: { type: 'string', title: 'Task' },
    dueDatetimeOffsetMinutes: { type: ['integer', 'null'], title: 'Due offset (minutes)' }
  }
};

export const workflowInstanceShape: RecordShape = {
  type: 'object',
  properties: {
    name: { type: 'string', title: 'Name' },
    status: { type: 'string', title: 'Status' },
    createdAt: { type: 'string', title: 'Created' },
    dueDatetime: { type: ['string', 'null'], title: 'Due' }
  }
};

export const taskInstanceShape: RecordShape = {
  type: 'object',
  properties: {
    id: { type: 'string', 'x-render-hint': 'hidden' },
    name: { type: 'string', title: 'Task' },
    status: { type: 'string', title: 'Status' },
    dueDatetime: { type: ['string', 'null'], title: 'Due' }
  }
};
