import { Response } from 'express';
import { ZodError } from 'zod';
import { LibraryError, PipelineFailure, httpStatusFor } from '@/shared/errors.js';
import { formatZodError } from '@/services/content-generator.js';

export function sendLibraryError(res: Response, error: LibraryError): void {
  res.status(httpStatusFor(error)).json({ success: false, error: error.message, kind: error.kind });
}

export function sendValidationError(res: Response, error: ZodError): void {
  res.status(400).json({ success: false, error: formatZodError(error), kind: 'invalid' });
}

export function pipelineFailureStatus(failure: PipelineFailure): number {
  switch (failure.category) {
    case 'validation':
      return 422;
    case 'timeout':
      return 504;
    case 'upstream':
    case 'cardinality':
      return 502;
  }
}

export function sendPipelineFailure(res: Response, storyId: string, failure: PipelineFailure): void {
  res.status(pipelineFailureStatus(failure)).json({
    success: false,
    storyId,
    error: failure.message,
    stage: failure.stage,
    category: failure.category,
  });
}
