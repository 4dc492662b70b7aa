export class HypermediaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HypermediaError';
  }
}

/**
 * Raised when a transition's path template names a placeholder the caller did
 * not supply. It points at an integration bug, not at bad client input.
 */
export class MissingParameterError extends HypermediaError {
  readonly code = 'MISSING_PARAMETER';
  readonly parameter: string;
  readonly operationId: string;
  readonly pathTemplate: string;

  constructor(parameter: string, operationId: string, pathTemplate: string) {
    super(`Missing parameter '${parameter}' for transition '${operationId}' with href '${pathTemplate}'`);
    this.name = 'MissingParameterError';
    this.parameter = parameter;
    this.operationId = operationId;
    this.pathTemplate = pathTemplate;
  }
}
