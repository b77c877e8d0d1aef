/**
 * Supported OpenAI chat models
 */

export const SUPPORTED_MODELS = ['gpt-4o-mini', 'gpt-4o', 'gpt-4-turbo', 'gpt-3.5-turbo'] as const;

export type SupportedModel = (typeof SUPPORTED_MODELS)[number];

export const DEFAULT_MODEL: SupportedModel = 'gpt-4o-mini';

export interface ModelList {
  models: SupportedModel[];
  defaultModel: SupportedModel;
}

export function isSupportedModel(model: string): model is SupportedModel {
  return SUPPORTED_MODELS.some((supported) => supported === model);
}

/**
 * Lists the models the relay accepts, falling back to the first supported
 * model if the default is ever dropped from the set.
 */
export function listModels(
  models: readonly SupportedModel[] = SUPPORTED_MODELS,
  defaultModel: SupportedModel = DEFAULT_MODEL
): ModelList {
  return {
    models: [...models],
    defaultModel: models.includes(defaultModel) ? defaultModel : models[0],
  };
}
