/**
 * Type definitions for chat API
 */

import type { SupportedModel } from '../lib/chat/models';

export interface ChatRequest {
  message: string;
  model: SupportedModel;
}

export interface ContentEvent {
  content: string;
}

export interface ErrorEvent {
  error: string;
}

export type StreamEvent = ContentEvent | ErrorEvent;

export interface ErrorResponseBody {
  error: string;
  code: string;
  field?: string;
}

export interface HealthResponseBody {
  status: 'healthy';
  provider_configured: boolean;
  version: string;
}

export interface ModelsResponseBody {
  models: string[];
  default_model: string;
}
