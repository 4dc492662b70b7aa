import { prebuiltItem } from '@cjkit/hypermedia';
import type { FastifyInstance } from 'fastify';

import { requireIdentity } from '../auth';
import { workflowInstanceFilterSchema } from '../domain/models';
import { sortTasks, taskItem, workflowInstanceItem } from '../hypermedia/items';
import { instanceIdParams, taskIdParams, workflowInstanceQuery } from '../openapi/definitions';
import type { AppContext } from '../types';
import { redirectTo, respond } from './respond';

type InstanceParams = { Params: { instanceId: string } };
type TaskParams = { Params: { taskId: string } };

const titleCase = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

export const registerWorkflowInstanceRoutes = (app: FastifyInstance, ctx: AppContext) => {
  const { service, metrics } = ctx;

  app.get<{ Querystring: { status?: string; definitionId?: string } }>(
    '/workflow-instances',
    {
      schema: {
        summary: 'Workflow Instances',
        tags: ['collection'],
        querystring: workflowInstanceQuery
      }
    },
    async function listWorkflowInstances(request, reply) {
      const identity = requireIdentity(request.identity);
      const hypermedia = app.hypermedia.forRequest(request);
      const filter = workflowInstanceFilterSchema.parse(request.query);
      const instances = await service.listInstances(identity.userId, filter);
      const document = hypermedia.buildDocument({
        title: 'Workflow Instances',
        links: ['home', 'listWorkflowInstances', 'listWorkflowDefinitions'],
        items: instances.map((instance) => prebuiltItem(workflowInstanceItem(hypermedia, instance))),
        queries: ['listWorkflowInstances']
      });
      return respond(ctx, request, reply, document);
    }
  );

  app.get<InstanceParams>(
    '/workflow-instances/:instanceId',
    {
      schema: {
        summary: 'View Workflow Instance',
        tags: ['item'],
        params: instanceIdParams
      }
    },
    async function viewWorkflowInstance(request, reply) {
      const identity = requireIdentity(request.identity);
      const hypermedia = app.hypermedia.forRequest(request);
      const instance = await service.getInstance(request.params.instanceId, identity.userId);
      const context = { instanceId: instance.id };
      const document = hypermedia.buildDocument({
        title: `${instance.name} - ${titleCase(instance.status)}`,
        links: [
          'home',
          'listWorkflowInstances',
          'listWorkflowDefinitions',
          ['viewWorkflowDefinition', { definitionId: instance.workflowDefinitionId }],
          [instance.status === 'archived' ? 'unarchiveWorkflowInstance' : 'archiveWorkflowInstance', context]
        ],
        items: sortTasks(instance.tasks).map((task) => prebuiltItem(taskItem(hypermedia, task)))
      });
      return respond(ctx, request, reply, document);
    }
  );

  app.post<InstanceParams>(
    '/workflow-instances/:instanceId/archive',
    {
      schema: {
        summary: 'Archive Workflow Instance',
        tags: ['edit'],
        params: instanceIdParams
      }
    },
    async function archiveWorkflowInstance(request, reply) {
      const identity = requireIdentity(request.identity);
      const instance = await service.archiveInstance(request.params.instanceId, identity.userId);
      return redirectTo(request, reply, 'viewWorkflowInstance', { instanceId: instance.id });
    }
  );

  app.post<InstanceParams>(
    '/workflow-instances/:instanceId/unarchive',
    {
      schema: {
        summary: 'Unarchive Workflow Instance',
        tags: ['edit'],
        params: instanceIdParams
      }
    },
    async function unarchiveWorkflowInstance(request, reply) {
      const identity = requireIdentity(request.identity);
      const instance = await service.unarchiveInstance(request.params.instanceId, identity.userId);
      return redirectTo(request, reply, 'viewWorkflowInstance', { instanceId: instance.id });
    }
  );

  app.post<TaskParams>(
    '/tasks/:taskId/complete',
    {
      schema: {
        summary: 'Complete Task',
        tags: ['edit'],
        params: taskIdParams
      }
    },
    async function completeTask(request, reply) {
      const identity = requireIdentity(request.identity);
      const { instance } = await service.completeTask(request.params.taskId, identity.userId);
      metrics.taskStateChanges.inc({ transition: 'complete' });
      return redirectTo(request, reply, 'viewWorkflowInstance', { instanceId: instance.id });
    }
  );

  app.post<TaskParams>(
    '/tasks/:taskId/reopen',
    {
      schema: {
        summary: 'Reopen Task',
        tags: ['edit'],
        params: taskIdParams
      }
    },
    async function reopenTask(request, reply) {
      const identity = requireIdentity(request.identity);
      const { instance } = await service.reopenTask(request.params.taskId, identity.userId);
      metrics.taskStateChanges.inc({ transition: 'reopen' });
      return redirectTo(request, reply, 'viewWorkflowInstance', { instanceId: instance.id });
    }
  );
};
