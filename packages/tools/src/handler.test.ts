import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  ConfigurationError,
  LengthExceededError,
  LookupError,
  NoActiveDraftError,
} from '@postcraft/shared';
import { LinkedInApiError, MediaValidationError } from '@postcraft/publisher';
import { errorBody, errorStatus } from './handler.js';

describe('errorStatus', () => {
  it('maps each error class to a status', () => {
    const zodError = z.object({ name: z.string() }).safeParse({}).error;

    expect(errorStatus(zodError)).toBe(400);
    expect(errorStatus(new ConfigurationError('bad theme', ['postFrequency: too big']))).toBe(400);
    expect(errorStatus(new MediaValidationError('too big'))).toBe(400);
    expect(errorStatus(new LookupError('theme', 'influencer'))).toBe(404);
    expect(errorStatus(new NoActiveDraftError())).toBe(409);
    expect(errorStatus(new LengthExceededError(3001, 3000))).toBe(422);
    expect(errorStatus(new LinkedInApiError('LinkedIn API error 503', 503))).toBe(502);
    expect(errorStatus(new Error('boom'))).toBe(500);
    expect(errorStatus('boom')).toBe(500);
  });
});

describe('errorBody', () => {
  it('lists validation issues by path', () => {
    const result = z.object({ options: z.array(z.string()).min(2) }).safeParse({ options: ['Yes'] });
    expect(errorBody(result.error)).toEqual({
      type: 'ValidationError',
      message: 'Invalid arguments',
      issues: ['options: Array must contain at least 2 element(s)'],
    });
  });

  it('keeps configuration issues', () => {
    expect(errorBody(new ConfigurationError('Invalid draft JSON', ['Unexpected token']))).toEqual({
      type: 'ConfigurationError',
      message: 'Invalid draft JSON',
      issues: ['Unexpected token'],
    });
  });

  it('uses the error name and message', () => {
    expect(errorBody(new LengthExceededError(3001, 3000))).toEqual({
      type: 'LengthExceededError',
      message: 'Post exceeds 3000 character limit: 3001 chars',
    });
    expect(errorBody(42)).toEqual({ type: 'Error', message: '42' });
  });
});
