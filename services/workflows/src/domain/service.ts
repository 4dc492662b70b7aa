import { nanoid } from 'nanoid';

import { WorkflowConflictError, WorkflowNotFoundError, WorkflowValidationError } from './errors';
import {
  newTaskDefinitionInputSchema,
  newWorkflowDefinitionInputSchema,
  newWorkflowInstanceInputSchema,
  saveWorkflowDefinitionInputSchema
} from './models';
import type {
  NewTaskDefinitionInput,
  NewWorkflowDefinitionInput,
  NewWorkflowInstanceInput,
  SaveWorkflowDefinitionInput,
  TaskDefinition,
  TaskInstance,
  WorkflowDefinition,
  WorkflowInstance,
  WorkflowInstanceFilter
} from './models';
import type { WorkflowRepository } from './repository';

const MINUTE_MS = 60_000;

export interface WorkflowServiceOptions {
  now?: () => Date;
  generateId?: (prefix: string) => string;
}

export interface TaskChange {
  instance: WorkflowInstance;
  task: TaskInstance;
}

const defaultGenerateId = (prefix: string): string => `${prefix}_${nanoid(10)}`;

/** Splits a textarea submission into ordered task definitions. */
export const parseTaskDefinitionLines = (text: string): TaskDefinition[] => {
  const tasks: TaskDefinition[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    const name = line.trim();
    if (name) {
      tasks.push({ name, order: index + 1, dueDatetimeOffsetMinutes: 0 });
    }
  });
  return tasks;
};

const taskDueDatetime = (instanceDue: Date | null, offsetMinutes: number | null): Date | null => {
  if (!instanceDue) {
    return null;
  }
  if (offsetMinutes === null) {
    return new Date(instanceDue.getTime());
  }
  return new Date(instanceDue.getTime() + offsetMinutes * MINUTE_MS);
};

export class WorkflowService {
  private readonly now: () => Date;
  private readonly generateId: (prefix: string) => string;

  constructor(
    private readonly repository: WorkflowRepository,
    options: WorkflowServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? defaultGenerateId;
  }

  async listDefinitions(): Promise<WorkflowDefinition[]> {
    return this.repository.listDefinitions();
  }

  async getDefinition(definitionId: string): Promise<WorkflowDefinition> {
    const definition = await this.repository.getDefinition(definitionId);
    if (!definition) {
      throw new WorkflowNotFoundError('Workflow definition', definitionId);
    }
    return definition;
  }

  async createDefinition(input: NewWorkflowDefinitionInput): Promise<WorkflowDefinition> {
    const parsed = newWorkflowDefinitionInputSchema.parse(input);
    const name = parsed.name.trim();
    if (!name) {
      throw new WorkflowValidationError('Definition name cannot be empty');
    }
    return this.repository.saveDefinition({
      id: this.generateId('def'),
      name,
      description: parsed.description,
      taskDefinitions: parsed.taskDefinitions,
      dueDatetime: parsed.dueDatetime
    });
  }

  async updateDefinition(
    definitionId: string,
    input: Pick<NewWorkflowDefinitionInput, 'name' | 'description' | 'taskDefinitions'>
  ): Promise<WorkflowDefinition> {
    const existing = await this.getDefinition(definitionId);
    const parsed = newWorkflowDefinitionInputSchema.parse(input);
    const name = parsed.name.trim();
    if (!name) {
      throw new WorkflowValidationError('Definition name cannot be empty');
    }
    if (parsed.taskDefinitions.length === 0) {
      throw new WorkflowValidationError('A definition must have at least one task');
    }
    return this.repository.saveDefinition({
      ...existing,
      name,
      description: parsed.description,
      taskDefinitions: parsed.taskDefinitions
    });
  }

  /**
   * Creates or replaces a definition from the single-form editor. Task names
   * arrive one per line and are numbered by line.
   */
  async saveDefinitionFromForm(input: SaveWorkflowDefinitionInput): Promise<WorkflowDefinition> {
    const parsed = saveWorkflowDefinitionInputSchema.parse(input);
    const taskDefinitions = parseTaskDefinitionLines(parsed.taskDefinitions);
    const existing = parsed.id ? await this.repository.getDefinition(parsed.id) : null;
    if (existing) {
      return this.updateDefinition(existing.id, {
        name: parsed.name,
        description: parsed.description,
        taskDefinitions
      });
    }
    return this.createDefinition({ name: parsed.name, description: parsed.description, taskDefinitions });
  }

  async addTaskDefinition(definitionId: string, input: NewTaskDefinitionInput): Promise<WorkflowDefinition> {
    const definition = await this.getDefinition(definitionId);
    const task = newTaskDefinitionInputSchema.parse(input);
    const nextOrder = definition.taskDefinitions.reduce((max, entry) => Math.max(max, entry.order), 0) + 1;
    return this.updateDefinition(definitionId, {
      name: definition.name,
      description: definition.description,
      taskDefinitions: [...definition.taskDefinitions, { ...task, order: nextOrder }]
    });
  }

  async createInstance(
    definitionId: string,
    userId: string,
    input: NewWorkflowInstanceInput = {}
  ): Promise<WorkflowInstance> {
    const definition = await this.getDefinition(definitionId);
    const parsed = newWorkflowInstanceInputSchema.parse(input);
    const instanceId = this.generateId('wf');
    const dueDatetime = parsed.dueDatetime ?? definition.dueDatetime;

    const tasks: TaskInstance[] = definition.taskDefinitions.map((task) => ({
      id: this.generateId('task'),
      workflowInstanceId: instanceId,
      name: task.name,
      order: task.order,
      status: 'pending',
      dueDatetime: taskDueDatetime(dueDatetime, task.dueDatetimeOffsetMinutes)
    }));

    return this.repository.saveInstance({
      id: instanceId,
      workflowDefinitionId: definition.id,
      name: parsed.name || definition.name,
      userId,
      status: 'active',
      createdAt: this.now(),
      dueDatetime,
      tasks
    });
  }

  async listInstances(userId: string, filter: WorkflowInstanceFilter = {}): Promise<WorkflowInstance[]> {
    return this.repository.listInstances(userId, filter);
  }

  async getInstance(instanceId: string, userId: string): Promise<WorkflowInstance> {
    const instance = await this.repository.getInstance(instanceId);
    if (!instance || instance.userId !== userId) {
      throw new WorkflowNotFoundError('Workflow instance', instanceId);
    }
    return instance;
  }

  async completeTask(taskId: string, userId: string): Promise<TaskChange> {
    const { instance, task } = await this.findOwnedTask(taskId, userId);
    if (task.status === 'completed') {
      return { instance, task };
    }

    task.status = 'completed';
    if (instance.tasks.every((entry) => entry.status === 'completed')) {
      instance.status = 'completed';
    }
    const saved = await this.repository.saveInstance(instance);
    return { instance: saved, task };
  }

  async reopenTask(taskId: string, userId: string): Promise<TaskChange> {
    const { instance, task } = await this.findOwnedTask(taskId, userId);
    if (task.status !== 'completed') {
      throw new WorkflowConflictError(`Task ${taskId} is not completed`);
    }

    task.status = 'pending';
    if (instance.status === 'completed') {
      instance.status = 'active';
    }
    const saved = await this.repository.saveInstance(instance);
    return { instance: saved, task };
  }

  async archiveInstance(instanceId: string, userId: string): Promise<WorkflowInstance> {
    const instance = await this.getInstance(instanceId, userId);
    if (instance.status === 'completed') {
      throw new WorkflowConflictError('Completed workflow instances cannot be archived');
    }
    if (instance.status === 'archived') {
      return instance;
    }
    return this.repository.saveInstance({ ...instance, status: 'archived' });
  }

  async unarchiveInstance(instanceId: string, userId: string): Promise<WorkflowInstance> {
    const instance = await this.getInstance(instanceId, userId);
    if (instance.status !== 'archived') {
      throw new WorkflowConflictError('Only archived workflow instances can be unarchived');
    }
    return this.repository.saveInstance({ ...instance, status: 'active' });
  }

  private async findOwnedTask(taskId: string, userId: string): Promise<TaskChange> {
    const instance = await this.repository.findInstanceByTaskId(taskId);
    const task = instance?.tasks.find((entry) => entry.id === taskId);
    if (!instance || !task || instance.userId !== userId) {
      throw new WorkflowNotFoundError('Task', taskId);
    }
    return { instance, task };
  }
}
