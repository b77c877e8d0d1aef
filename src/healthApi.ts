/**
 * Health check endpoint
 */

import { Request, Response } from 'express';
import { version } from '../package.json';
import { HealthResponseBody } from './types/chat';

export interface HealthApiDependencies {
  providerConfigured: boolean;
}

/**
 * Reports whether an OpenAI key is configured. Makes no provider call.
 */
export function createHealthHandler({ providerConfigured }: HealthApiDependencies) {
  return function healthApi(_req: Request, res: Response): void {
    const body: HealthResponseBody = {
      status: 'healthy',
      provider_configured: providerConfigured,
      version,
    };
    res.json(body);
  };
}
