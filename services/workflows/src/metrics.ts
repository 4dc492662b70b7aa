import { Counter, Gauge, Registry } from 'prom-client';

export interface WorkflowsMetrics {
  register: Registry;
  documentsRepresented: Counter<'representation'>;
  workflowInstancesCreated: Counter<'definition'>;
  taskStateChanges: Counter<'transition'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): WorkflowsMetrics => {
  const register = new Registry();

  const documentsRepresented = new Counter({
    name: 'workflows_documents_represented_total',
    help: 'Hypermedia documents sent, by representation',
    registers: [register],
    labelNames: ['representation'] as const
  });

  const workflowInstancesCreated = new Counter({
    name: 'workflows_instances_created_total',
    help: 'Workflow instances created, by definition',
    registers: [register],
    labelNames: ['definition'] as const
  });

  const taskStateChanges = new Counter({
    name: 'workflows_task_state_changes_total',
    help: 'Task completions and reopenings',
    registers: [register],
    labelNames: ['transition'] as const
  });

  const readinessGauge = new Gauge({
    name: 'workflows_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    documentsRepresented,
    workflowInstancesCreated,
    taskStateChanges,
    readinessGauge
  };
};
