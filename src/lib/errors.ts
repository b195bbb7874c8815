import { NextResponse } from 'next/server';
import type { ApiError } from '@shared/types/api';

/** Malformed input, rejected before anything is created. */
export class SubmissionError extends Error {
  readonly status = 400;
  constructor(message: string) {
    super(message);
    this.name = 'SubmissionError';
  }
}

export class NotFoundError extends Error {
  readonly status = 404;
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export class NotReadyError extends Error {
  readonly status = 409;
  constructor(jobId: string, status: string) {
    super(`Analysis ${jobId} is ${status}, not completed`);
    this.name = 'NotReadyError';
  }
}

/** A commit that is not the immediate successor of the job's current stage. */
export class StaleStageError extends Error {
  constructor(
    readonly jobId: string,
    readonly attempted: string,
    readonly current: string
  ) {
    super(`Stage ${attempted} cannot follow ${current} on job ${jobId}`);
    this.name = 'StaleStageError';
  }
}

/** A collaborator raised or answered with the wrong shape. */
export class StageFailure extends Error {
  constructor(
    readonly stage: string,
    message: string
  ) {
    super(`${stage} failed: ${message}`);
    this.name = 'StageFailure';
  }
}

export class TimeoutFailure extends Error {
  constructor(budgetMs: number) {
    const budget = budgetMs >= 1000 ? `${Math.round(budgetMs / 1000)}s` : `${budgetMs}ms`;
    super(`Analysis exceeded its ${budget} time budget`);
    this.name = 'TimeoutFailure';
  }
}

export class CancelledFailure extends Error {
  constructor() {
    super('Analysis was cancelled');
    this.name = 'CancelledFailure';
  }
}

export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string' && error.length > 0) return error;
  return fallback;
}

export function toErrorResponse(error: unknown, context: string) {
  if (error instanceof SubmissionError || error instanceof NotFoundError || error instanceof NotReadyError) {
    return NextResponse.json<ApiError>({ error: error.message }, { status: error.status });
  }

  console.error(`[${context}]`, error);
  return NextResponse.json<ApiError>({ error: errorMessage(error, 'Request failed') }, { status: 500 });
}
