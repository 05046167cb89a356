// lib/__tests__/services.test.ts
import path from 'path';
import { BestMatchSelector } from '../bestMatch';
import { ConfigError, parseConfig } from '../config';
import { createServices } from '../services';

const ROOT = path.join(__dirname, '../..');

describe('services.ts', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('wires the services from configuration', () => {
    const config = parseConfig(
      {
        openai: { apiKey: 'test-key' },
        match: { apiKey: 'test-match-key', baseURL: 'https://openrouter.ai/api/v1', model: 'openai/gpt-4-turbo-preview' },
        sources: [
          { name: 'openai', provider: 'openai', model: 'gpt-4-turbo-preview' },
          { name: 'claude', provider: 'anthropic', apiKey: 'test-anthropic-key', model: 'claude-3-5-sonnet-20240620' }
        ]
      },
      ROOT
    );

    const services = createServices(config);

    expect(services.selector).toBeInstanceOf(BestMatchSelector);
    expect(services.commodityCodes.size).toBe(20);
  });

  it('refuses an anthropic source without a key', () => {
    const config = parseConfig({ openai: { apiKey: 'test-key' } }, ROOT);
    config.sources = [{ name: 'claude', provider: 'anthropic', model: 'claude-3-5-sonnet-20240620' }];

    expect(() => createServices(config)).toThrow(ConfigError);
  });
});
