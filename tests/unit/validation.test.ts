/**
 * Unit tests for chat request validation
 */

import { parseChatRequest } from '../../src/lib/chat/validation';
import { ValidationError } from '../../src/lib/utils/errors';

function validationErrorOf(body: unknown): ValidationError {
  try {
    parseChatRequest(body);
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('Expected parseChatRequest to throw');
}

describe('parseChatRequest', () => {
  it('should accept a message with a supported model', () => {
    expect(parseChatRequest({ message: 'Explain Laplace transform', model: 'gpt-4o' })).toEqual({
      message: 'Explain Laplace transform',
      model: 'gpt-4o',
    });
  });

  it('should default the model when omitted', () => {
    expect(parseChatRequest({ message: 'What is $e^{i\\pi}$?' })).toEqual({
      message: 'What is $e^{i\\pi}$?',
      model: 'gpt-4o-mini',
    });
  });

  it('should default the model when null', () => {
    expect(parseChatRequest({ message: 'hi', model: null }).model).toBe('gpt-4o-mini');
  });

  it('should keep the message exactly as sent', () => {
    expect(parseChatRequest({ message: '  padded  ' }).message).toBe('  padded  ');
  });

  it.each([[''], ['   '], ['\n\t']])('should reject blank message %j', (message) => {
    const error = validationErrorOf({ message });
    expect(error.message).toBe('Message is required');
    expect(error.field).toBe('message');
    expect(error.status).toBe(400);
    expect(error.code).toBe('invalid_request');
  });

  it('should reject a missing or non-string message', () => {
    expect(validationErrorOf({}).message).toBe('Message is required');
    expect(validationErrorOf({ message: 42 }).message).toBe('Message is required');
  });

  it('should reject an unsupported model with a descriptive error', () => {
    const error = validationErrorOf({ message: 'hi', model: 'gpt-5-imaginary' });
    expect(error.message).toBe('Model not supported: gpt-5-imaginary');
    expect(error.field).toBe('model');
  });

  it('should reject a non-string model', () => {
    expect(validationErrorOf({ message: 'hi', model: 7 }).message).toBe('Model not supported: 7');
  });

  it.each([[null], ['text'], [[{ message: 'hi' }]]])('should reject non-object body %j', (body) => {
    const error = validationErrorOf(body);
    expect(error.message).toBe('Request body must be a JSON object');
    expect(error.field).toBeUndefined();
  });
});
