import type { WorkflowDefinition, WorkflowInstance, WorkflowInstanceFilter } from './models';

export interface WorkflowRepository {
  listDefinitions(): Promise<WorkflowDefinition[]>;
  getDefinition(id: string): Promise<WorkflowDefinition | null>;
  saveDefinition(definition: WorkflowDefinition): Promise<WorkflowDefinition>;
  listInstances(userId: string, filter?: WorkflowInstanceFilter): Promise<WorkflowInstance[]>;
  getInstance(id: string): Promise<WorkflowInstance | null>;
  findInstanceByTaskId(taskId: string): Promise<WorkflowInstance | null>;
  saveInstance(instance: WorkflowInstance): Promise<WorkflowInstance>;
}

const clone = <T>(value: T): T => structuredClone(value);

/**
 * Keeps definitions and instances in insertion order. Values are cloned on the
 * way in and out so callers never share state with the store.
 */
export class InMemoryWorkflowRepository implements WorkflowRepository {
  private readonly definitions = new Map<string, WorkflowDefinition>();
  private readonly instances = new Map<string, WorkflowInstance>();

  async listDefinitions(): Promise<WorkflowDefinition[]> {
    return Array.from(this.definitions.values(), clone);
  }

  async getDefinition(id: string): Promise<WorkflowDefinition | null> {
    const definition = this.definitions.get(id);
    return definition ? clone(definition) : null;
  }

  async saveDefinition(definition: WorkflowDefinition): Promise<WorkflowDefinition> {
    this.definitions.set(definition.id, clone(definition));
    return clone(definition);
  }

  async listInstances(userId: string, filter: WorkflowInstanceFilter = {}): Promise<WorkflowInstance[]> {
    const matches: WorkflowInstance[] = [];
    for (const instance of this.instances.values()) {
      if (instance.userId !== userId) {
        continue;
      }
      if (filter.status && instance.status !== filter.status) {
        continue;
      }
      if (filter.definitionId && instance.workflowDefinitionId !== filter.definitionId) {
        continue;
      }
      matches.push(clone(instance));
    }
    return matches;
  }

  async getInstance(id: string): Promise<WorkflowInstance | null> {
    const instance = this.instances.get(id);
    return instance ? clone(instance) : null;
  }

  async findInstanceByTaskId(taskId: string): Promise<WorkflowInstance | null> {
    for (const instance of this.instances.values()) {
      if (instance.tasks.some((task) => task.id === taskId)) {
        return clone(instance);
      }
    }
    return null;
  }

  async saveInstance(instance: WorkflowInstance): Promise<WorkflowInstance> {
    this.instances.set(instance.id, clone(instance));
    return clone(instance);
  }
}
