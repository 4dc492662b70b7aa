export class WorkflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class WorkflowNotFoundError extends WorkflowError {
  readonly code = 'WORKFLOW_NOT_FOUND';

  constructor(resource: string, id: string) {
    super(`${resource} ${id} was not found`);
    this.name = 'WorkflowNotFoundError';
  }
}

export class WorkflowConflictError extends WorkflowError {
  readonly code = 'WORKFLOW_CONFLICT';

  constructor(message: string) {
    super(message);
    this.name = 'WorkflowConflictError';
  }
}

export class WorkflowValidationError extends WorkflowError {
  readonly code = 'WORKFLOW_VALIDATION_FAILED';
  readonly issues: unknown;

  constructor(message: string, issues?: unknown) {
    super(message);
    this.name = 'WorkflowValidationError';
    this.issues = issues;
  }
}
