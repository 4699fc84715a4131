import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export type Stage = "pii" | "retrieval" | "generation" | "supervision" | "persistence";

export class AppError extends Error {
  statusCode = 500;
  code = "internal_error";
  isOperational = true;
}

export class ValidationError extends AppError {
  statusCode = 400;
  code = "validation_error";
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }

  static fromZod(error: ZodError): ValidationError {
    return new ValidationError(fromZodError(error).message);
  }
}

export class NotFoundError extends AppError {
  statusCode = 404;
  code = "not_found";
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class RetrievalUnavailable extends AppError {
  statusCode = 503;
  code = "retrieval_unavailable";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RetrievalUnavailable";
  }
}

export class GenerationError extends AppError {
  statusCode = 502;
  code = "generation_error";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export class PipelineError extends AppError {
  statusCode = 500;
  code = "pipeline_error";
  stage: Stage;
  constructor(stage: Stage, cause: unknown) {
    super(`${stage} stage failed: ${getErrorMessage(cause)}`, { cause });
    this.name = "PipelineError";
    this.stage = stage;
  }
}

export class InvalidStateError extends AppError {
  statusCode = 409;
  code = "invalid_state";
  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export class ConcurrentUpdateError extends AppError {
  statusCode = 409;
  code = "concurrent_update";
  constructor(conversationId: string, attempts: number) {
    super(`conversation ${conversationId} changed concurrently ${attempts} times; redeliver the event`);
    this.name = "ConcurrentUpdateError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) return 400;
  if (error instanceof AppError) return error.statusCode;
  return 500;
}

export function getErrorCode(error: unknown): string {
  if (error instanceof ZodError) return "validation_error";
  if (error instanceof AppError) return error.code;
  return "internal_error";
}
