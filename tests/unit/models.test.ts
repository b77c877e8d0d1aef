/**
 * Unit tests for the supported model list
 */

import {
  DEFAULT_MODEL,
  SUPPORTED_MODELS,
  isSupportedModel,
  listModels,
} from '../../src/lib/chat/models';

describe('models', () => {
  it('should include the default model in the supported set', () => {
    expect(SUPPORTED_MODELS).toContain(DEFAULT_MODEL);
  });

  it('should recognize supported identifiers only', () => {
    expect(isSupportedModel('gpt-4o')).toBe(true);
    expect(isSupportedModel('gpt-3.5-turbo')).toBe(true);
    expect(isSupportedModel('GPT-4O')).toBe(false);
    expect(isSupportedModel('')).toBe(false);
  });

  it('should list all models with the default', () => {
    expect(listModels()).toEqual({
      models: ['gpt-4o-mini', 'gpt-4o', 'gpt-4-turbo', 'gpt-3.5-turbo'],
      defaultModel: 'gpt-4o-mini',
    });
  });

  it('should fall back to the first model when the default is not in the set', () => {
    expect(listModels(['gpt-4o', 'gpt-4-turbo'], 'gpt-4o-mini')).toEqual({
      models: ['gpt-4o', 'gpt-4-turbo'],
      defaultModel: 'gpt-4o',
    });
  });
});
