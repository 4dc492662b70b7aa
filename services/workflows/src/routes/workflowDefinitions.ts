import { prebuiltItem } from '@cjkit/hypermedia';
import type { Template, TransitionDeclaration } from '@cjkit/hypermedia';
import type { FastifyInstance } from 'fastify';

import type {
  NewTaskDefinitionInput,
  NewWorkflowInstanceInput,
  SaveWorkflowDefinitionInput
} from '../domain/models';
import { taskDefinitionItems, workflowDefinitionItem } from '../hypermedia/items';
import { requireIdentity } from '../auth';
import {
  addTaskDefinitionBody,
  createWorkflowInstanceBody,
  definitionIdParams,
  saveWorkflowDefinitionBody
} from '../openapi/definitions';
import type { AppContext } from '../types';
import { redirectTo, respond } from './respond';

const NEW_DEFINITION_DEFAULTS = {
  name: 'New Workflow Definition',
  taskDefinitions: '1. Task One\n2. Task Two\n3. Task Three'
};

type DefinitionParams = { Params: { definitionId: string } };

export const registerWorkflowDefinitionRoutes = (app: FastifyInstance, ctx: AppContext) => {
  const { service } = ctx;

  app.get(
    '/workflow-definitions',
    {
      schema: {
        summary: 'Workflow Definitions',
        tags: ['collection']
      }
    },
    async function listWorkflowDefinitions(request, reply) {
      const hypermedia = app.hypermedia.forRequest(request);
      const definitions = await service.listDefinitions();
      const document = hypermedia.buildDocument({
        title: 'Workflow Definitions',
        links: ['home', 'listWorkflowInstances', 'listWorkflowDefinitions', 'showWorkflowDefinitionForm'],
        items: definitions.map((definition) => prebuiltItem(workflowDefinitionItem(hypermedia, definition)))
      });
      return respond(ctx, request, reply, document);
    }
  );

  app.get(
    '/workflow-definitions/new',
    {
      schema: {
        summary: 'New Workflow Definition',
        tags: ['create']
      }
    },
    async function showWorkflowDefinitionForm(request, reply) {
      const hypermedia = app.hypermedia.forRequest(request);
      const form = hypermedia.transition('saveWorkflowDefinition')?.toTemplate(NEW_DEFINITION_DEFAULTS);
      const document = hypermedia.buildDocument({
        title: 'Create Workflow Definition',
        links: ['home', 'listWorkflowDefinitions'],
        templates: form ? [form] : []
      });
      return respond(ctx, request, reply, document);
    }
  );

  app.post<{ Body: SaveWorkflowDefinitionInput }>(
    '/workflow-definitions',
    {
      schema: {
        summary: 'Save Workflow Definition',
        tags: ['create'],
        body: saveWorkflowDefinitionBody
      }
    },
    async function saveWorkflowDefinition(request, reply) {
      const definition = await service.saveDefinitionFromForm(request.body);
      request.log.info({ definitionId: definition.id }, 'Workflow definition saved');
      return redirectTo(request, reply, 'viewWorkflowDefinition', { definitionId: definition.id });
    }
  );

  app.get<DefinitionParams>(
    '/workflow-definitions/:definitionId',
    {
      schema: {
        summary: 'View Workflow Definition',
        tags: ['item'],
        params: definitionIdParams
      }
    },
    async function viewWorkflowDefinition(request, reply) {
      const hypermedia = app.hypermedia.forRequest(request);
      const definition = await service.getDefinition(request.params.definitionId);
      const context = { definitionId: definition.id };

      const templates: TransitionDeclaration<Template>[] = [
        ['createWorkflowInstance', context],
        ['addTaskDefinition', context]
      ];
      const editForm = hypermedia.transition('saveWorkflowDefinition')?.toTemplate({
        id: definition.id,
        name: definition.name,
        description: definition.description,
        taskDefinitions: definition.taskDefinitions.map((task) => task.name).join('\n')
      });
      if (editForm) {
        templates.push(editForm);
      }

      const document = hypermedia.buildDocument({
        title: definition.name,
        links: ['home', 'listWorkflowInstances', 'listWorkflowDefinitions'],
        items: [workflowDefinitionItem(hypermedia, definition), ...taskDefinitionItems(hypermedia, definition)].map(
          (item) => prebuiltItem(item)
        ),
        templates
      });
      return respond(ctx, request, reply, document);
    }
  );

  app.post<DefinitionParams & { Body: NewTaskDefinitionInput }>(
    '/workflow-definitions/:definitionId/tasks',
    {
      schema: {
        summary: 'Add Task Definition',
        tags: ['create'],
        params: definitionIdParams,
        body: addTaskDefinitionBody
      }
    },
    async function addTaskDefinition(request, reply) {
      const definition = await service.addTaskDefinition(request.params.definitionId, request.body);
      return redirectTo(request, reply, 'viewWorkflowDefinition', { definitionId: definition.id });
    }
  );

  app.post<DefinitionParams & { Body: NewWorkflowInstanceInput | undefined }>(
    '/workflow-definitions/:definitionId/instances',
    {
      schema: {
        summary: 'Create Workflow Instance',
        tags: ['create', 'workflow-instances'],
        params: definitionIdParams,
        body: createWorkflowInstanceBody
      }
    },
    async function createWorkflowInstance(request, reply) {
      const identity = requireIdentity(request.identity);
      const { definitionId } = request.params;
      const instance = await service.createInstance(definitionId, identity.userId, request.body ?? {});
      ctx.metrics.workflowInstancesCreated.inc({ definition: definitionId });
      request.log.info({ instanceId: instance.id, definitionId }, 'Workflow instance created');
      return redirectTo(request, reply, 'viewWorkflowInstance', { instanceId: instance.id });
    }
  );
};
