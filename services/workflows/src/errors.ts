import { ZodError } from 'zod';

import { MissingParameterError } from '@cjkit/hypermedia';
import type { DocumentError } from '@cjkit/hypermedia';

import { WorkflowConflictError, WorkflowNotFoundError, WorkflowValidationError } from './domain/errors';

export interface ErrorResponse {
  statusCode: number;
  title: string;
  message: string;
  details?: unknown;
}

const readStatusCode = (error: unknown): number | undefined => {
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
};

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof WorkflowNotFoundError) {
    return {
      statusCode: 404,
      title: 'not_found',
      message: error.message
    };
  }

  if (error instanceof WorkflowConflictError) {
    return {
      statusCode: 409,
      title: 'conflict',
      message: error.message
    };
  }

  if (error instanceof WorkflowValidationError) {
    return {
      statusCode: 422,
      title: 'validation_failed',
      message: error.message,
      details: error.issues
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      title: 'bad_request',
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  if (error instanceof MissingParameterError) {
    return {
      statusCode: 500,
      title: 'missing_transition_parameter',
      message: error.message
    };
  }

  const statusCode = readStatusCode(error);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500 && error instanceof Error) {
    return {
      statusCode,
      title: 'bad_request',
      message: error.message
    };
  }

  return {
    statusCode: 500,
    title: 'internal_error',
    message: 'Unexpected error'
  };
};

export const toDocumentError = (mapped: ErrorResponse): DocumentError => {
  const documentError: DocumentError = {
    title: mapped.title,
    code: mapped.statusCode,
    message: mapped.message
  };
  if (mapped.details !== undefined) {
    documentError.details = JSON.stringify(mapped.details, null, 2);
  }
  return documentError;
};
