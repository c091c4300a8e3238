import { ZodError } from 'zod';
import {
  ConfigurationError,
  LengthExceededError,
  LookupError,
  NoActiveDraftError,
} from '@postcraft/shared';
import { LinkedInApiError, MediaValidationError } from '@postcraft/publisher';
import type { ToolRegistry } from './registry.js';

export interface ErrorBody {
  type: string;
  message: string;
  issues?: string[];
}

export type ToolResponse =
  | { status: 200; body: { ok: true; result: unknown } }
  | { status: number; body: { ok: false; error: ErrorBody } };

export function errorStatus(err: unknown): number {
  if (err instanceof ZodError || err instanceof ConfigurationError || err instanceof MediaValidationError) return 400;
  if (err instanceof LookupError) return 404;
  if (err instanceof NoActiveDraftError) return 409;
  if (err instanceof LengthExceededError) return 422;
  if (err instanceof LinkedInApiError) return 502;
  return 500;
}

export function errorBody(err: unknown): ErrorBody {
  if (err instanceof ZodError) {
    return {
      type: 'ValidationError',
      message: 'Invalid arguments',
      issues: err.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    };
  }
  if (err instanceof ConfigurationError) {
    return { type: err.name, message: err.message, issues: err.issues };
  }
  if (err instanceof Error) return { type: err.name, message: err.message };
  return { type: 'Error', message: String(err) };
}

/** Run one tool and shape the outcome as an HTTP status and JSON body. Never rejects. */
export async function handleToolRequest(registry: ToolRegistry, name: string, args: unknown): Promise<ToolResponse> {
  try {
    const result = await registry.invoke(name, args);
    return { status: 200, body: { ok: true, result } };
  } catch (err) {
    return { status: errorStatus(err), body: { ok: false, error: errorBody(err) } };
  }
}
