/**
 * Lists the chat models the relay accepts
 */

import { Request, Response } from 'express';
import { listModels } from './lib/chat/models';
import { ModelsResponseBody } from './types/chat';

export function modelsApi(_req: Request, res: Response): void {
  const { models, defaultModel } = listModels();
  const body: ModelsResponseBody = {
    models,
    default_model: defaultModel,
  };
  res.json(body);
}
