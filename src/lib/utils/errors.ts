/**
 * Custom error classes for the chat relay
 */

import OpenAI from 'openai';

/**
 * Error thrown when a chat request fails validation
 */
export class ValidationError extends Error {
  readonly status = 400;
  readonly code = 'invalid_request';

  constructor(message: string, public field?: string) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when /chat is called without an OpenAI key configured
 */
export class ProviderNotConfiguredError extends Error {
  readonly status = 503;
  readonly code = 'provider_not_configured';

  constructor(message: string = 'OpenAI API key not configured') {
    super(message);
    this.name = 'ProviderNotConfiguredError';
    Object.setPrototypeOf(this, ProviderNotConfiguredError.prototype);
  }
}

/**
 * Error raised by the completion provider. The message is safe to show
 * to users; the raw failure is kept in originalError.
 */
export class ProviderError extends Error {
  constructor(message: string, public originalError?: unknown) {
    super(message);
    this.name = 'ProviderError';
    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}

/**
 * Error thrown when an environment variable holds an unusable value
 */
export class ConfigurationError extends Error {
  constructor(message: string, public key?: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export const PROVIDER_ERROR_MESSAGES = {
  authentication: 'Provider authentication failed',
  rateLimit: 'Provider rate limit exceeded',
  connection: 'Could not reach the AI provider',
  rejected: 'The AI provider rejected the request',
  generic: 'The AI provider returned an error',
} as const;

/**
 * Maps a provider failure to a fixed message that is safe to send to the
 * browser. Raw exception text never leaves the server.
 */
export function sanitizeProviderError(error: unknown): string {
  if (error instanceof ProviderError) {
    return error.message;
  }

  // Connection errors first: APIConnectionTimeoutError extends APIConnectionError
  if (error instanceof OpenAI.APIConnectionError) {
    return PROVIDER_ERROR_MESSAGES.connection;
  }
  if (
    error instanceof OpenAI.AuthenticationError ||
    error instanceof OpenAI.PermissionDeniedError
  ) {
    return PROVIDER_ERROR_MESSAGES.authentication;
  }
  if (error instanceof OpenAI.RateLimitError) {
    return PROVIDER_ERROR_MESSAGES.rateLimit;
  }
  if (
    error instanceof OpenAI.BadRequestError ||
    error instanceof OpenAI.NotFoundError ||
    error instanceof OpenAI.UnprocessableEntityError
  ) {
    return PROVIDER_ERROR_MESSAGES.rejected;
  }

  return PROVIDER_ERROR_MESSAGES.generic;
}
