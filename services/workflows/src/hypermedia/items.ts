import { projectRecord } from '@cjkit/hypermedia';
import type { Hypermedia, Item, Link, TransitionContext } from '@cjkit/hypermedia';

import type { TaskInstance, WorkflowDefinition, WorkflowInstance } from '../domain/models';
import {
  taskDefinitionShape,
  taskInstanceShape,
  workflowDefinitionShape,
  workflowInstanceShape
} from '../openapi/definitions';

type LinkTarget = [operationId: string, context: TransitionContext];

const resolveLinks = (hypermedia: Hypermedia, targets: LinkTarget[]): Link[] => {
  const links: Link[] = [];
  for (const [operationId, context] of targets) {
    const transition = hypermedia.transition(operationId, context);
    if (transition) {
      links.push(transition.toLink());
    }
  }
  return links;
};

const hrefFor = (hypermedia: Hypermedia, operationId: string, context: TransitionContext): string =>
  hypermedia.transition(operationId, context)?.href ?? '';

export const workflowDefinitionItem = (hypermedia: Hypermedia, definition: WorkflowDefinition): Item => {
  const context = { definitionId: definition.id };
  return projectRecord(definition, {
    shape: workflowDefinitionShape,
    href: hrefFor(hypermedia, 'viewWorkflowDefinition', context),
    links: resolveLinks(hypermedia, [
      ['viewWorkflowDefinition', context],
      ['createWorkflowInstance', context]
    ])
  });
};

export const taskDefinitionItems = (hypermedia: Hypermedia, definition: WorkflowDefinition): Item[] => {
  const href = hrefFor(hypermedia, 'viewWorkflowDefinition', { definitionId: definition.id });
  return [...definition.taskDefinitions]
    .sort((left, right) => left.order - right.order)
    .map((task) => projectRecord(task, { shape: taskDefinitionShape, href, rel: 'task-definition' }));
};

export const workflowInstanceItem = (hypermedia: Hypermedia, instance: WorkflowInstance): Item => {
  const context = { instanceId: instance.id };
  const targets: LinkTarget[] = [['viewWorkflowInstance', context]];
  if (instance.status === 'archived') {
    targets.push(['unarchiveWorkflowInstance', context]);
  } else {
    targets.push(['archiveWorkflowInstance', context]);
  }
  return projectRecord(instance, {
    shape: workflowInstanceShape,
    href: hrefFor(hypermedia, 'viewWorkflowInstance', context),
    links: resolveLinks(hypermedia, targets)
  });
};

/** Open tasks first, each group in definition order. */
export const sortTasks = (tasks: readonly TaskInstance[]): TaskInstance[] =>
  [...tasks].sort((left, right) => {
    const leftDone = left.status === 'completed' ? 1 : 0;
    const rightDone = right.status === 'completed' ? 1 : 0;
    return leftDone - rightDone || left.order - right.order;
  });

export const taskItem = (hypermedia: Hypermedia, task: TaskInstance): Item => {
  const context = { taskId: task.id };
  return projectRecord(task, {
    shape: taskInstanceShape,
    href: hrefFor(hypermedia, 'viewWorkflowInstance', { instanceId: task.workflowInstanceId }),
    rel: 'task',
    links: resolveLinks(hypermedia, [[task.status === 'completed' ? 'reopenTask' : 'completeTask', context]])
  });
};
