import type { Response } from 'express';
import { z, type ZodIssue } from 'zod';
import { isOrderDomainError } from '../domain/errors';

function describeIssue(issue: ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Writes the `{ success: false, error, code }` envelope. Domain errors keep
 * their own code and status; anything unexpected is logged and becomes a 500
 * under `fallbackCode`.
 */
export function sendError(res: Response, error: unknown, fallbackCode: string, fallbackMessage: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({
      success: false,
      error: error.issues.map(describeIssue).join('; '),
      code: 'INVALID_REQUEST',
      details: { fields: error.issues.map((issue) => issue.path.join('.')) },
    });
    return;
  }
  if (isOrderDomainError(error)) {
    res.status(error.statusCode).json({ success: false, ...error.toJSON() });
    return;
  }
  console.error(fallbackCode, error);
  res.status(500).json({ success: false, error: fallbackMessage, code: fallbackCode });
}
