import type { WorkflowsConfig } from './config';
import type { WorkflowService } from './domain/service';
import type { WorkflowsMetrics } from './metrics';

export interface ReadinessState {
  repository: boolean;
  templates: boolean;
}

export interface AppContext {
  config: WorkflowsConfig;
  service: WorkflowService;
  metrics: WorkflowsMetrics;
  readiness: ReadinessState;
}
