/**
 * Workflow request validation.
 *
 * @module workflow/request
 */

import { z } from 'zod';
import { WorkflowValidationError, type ValidationIssue } from '../utils/errors.js';
import type { StagePayload, WorkflowRequest } from './types.js';

/** Longest instruction accepted, in characters */
export const MAX_INSTRUCTION_LENGTH = 20000;

export const conversationMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export const workflowRequestSchema = z.object({
  instruction: z
    .string({
      required_error: 'instruction is required',
      invalid_type_error: 'instruction must be a string',
    })
    .trim()
    .min(1, 'instruction must not be empty')
    .max(MAX_INSTRUCTION_LENGTH, `instruction must be at most ${MAX_INSTRUCTION_LENGTH} characters`),
  contextId: z.string().trim().min(1, 'contextId must not be empty').optional(),
  workflowId: z.string().trim().min(1, 'workflowId must not be empty').optional(),
  pattern: z.enum(['DATA_ONLY', 'DATA_ANALYSIS', 'FULL_WORKFLOW']).optional(),
  history: z.array(conversationMessageSchema).optional(),
  data: z.record(z.unknown()).optional(),
});

export const stagePayloadSchema = z.object({
  text: z.string(),
  data: z.record(z.unknown()).nullable(),
  dataParts: z.array(z.record(z.unknown())),
});

/**
 * Convert zod issues to flat `{ path, message }` records.
 */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Validate raw input into a frozen {@link WorkflowRequest}.
 *
 * A plain string is taken as the instruction.
 *
 * @throws WorkflowValidationError
 */
export function parseWorkflowRequest(input: unknown): WorkflowRequest {
  const candidate = typeof input === 'string' ? { instruction: input } : input;
  const parsed = workflowRequestSchema.safeParse(candidate);

  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    const first = issues[0];
    const summary = first ? `${first.path}: ${first.message}` : 'unknown problem';
    throw new WorkflowValidationError(`Invalid workflow request (${summary})`, issues);
  }

  const { history, ...rest } = parsed.data;
  return Object.freeze({
    ...rest,
    ...(history ? { history: Object.freeze(history) } : {}),
  });
}

/**
 * Check a stage handler's output at runtime.
 */
export function parseStagePayload(value: unknown): { payload?: StagePayload; issues: ValidationIssue[] } {
  const parsed = stagePayloadSchema.safeParse(value);
  if (parsed.success) {
    return { payload: parsed.data, issues: [] };
  }
  return { issues: toValidationIssues(parsed.error) };
}
