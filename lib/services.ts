// lib/services.ts
// Builds the server-side object graph from configuration

import type { AppConfig, SourceConfig } from './config';
import { ConfigError, loadConfig } from './config';
import { getFlagState } from './flags';
import { BestMatchSelector } from './bestMatch';
import type { ClassificationServices } from './classifyProduct';
import { CommodityCodeIndex } from './commodityCodes';
import { createAnthropicClient, createOpenAIClient, type CompletionClient } from './llmClient';
import { ProductClassifier, type HsCodeSource } from './productClassifier';

export interface Services extends ClassificationServices {
  classifier: ProductClassifier;
  commodityCodes: CommodityCodeIndex;
  selector: BestMatchSelector;
}

function sourceClient(source: SourceConfig, config: AppConfig, primary: CompletionClient): CompletionClient {
  if (source.provider === 'anthropic') {
    if (!source.apiKey) throw new ConfigError(`sources.${source.name}.apiKey is required for anthropic sources`);
    return createAnthropicClient({ apiKey: source.apiKey });
  }
  if (!source.apiKey && !source.baseURL) return primary;
  return createOpenAIClient({
    apiKey: source.apiKey ?? config.openai.apiKey,
    baseURL: source.baseURL
  });
}

export function createServices(config: AppConfig): Services {
  const primary = createOpenAIClient({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseURL
  });

  const sources: HsCodeSource[] =
    config.sources.length > 0
      ? config.sources.map(source => ({
          name: source.name,
          client: sourceClient(source, config, primary),
          model: source.model
        }))
      : [{ name: 'openai', client: primary, model: config.openai.model }];

  const matchClient =
    config.match.apiKey || config.match.baseURL || config.match.referer
      ? createOpenAIClient({
          apiKey: config.match.apiKey ?? config.openai.apiKey,
          baseURL: config.match.baseURL,
          referer: config.match.referer
        })
      : primary;

  return {
    classifier: new ProductClassifier({ client: primary, model: config.openai.model, sources }),
    commodityCodes: CommodityCodeIndex.fromFile(config.commodityCodesPath),
    selector: new BestMatchSelector({
      client: matchClient,
      model: config.match.model,
      temperature: config.match.temperature,
      maxTokens: config.match.maxTokens
    })
  };
}

let services: Services | null = null;

/**
 * Lazily built services for API routes. Throws ConfigError when the
 * configuration file is missing or incomplete.
 */
export function getServices(): Services {
  if (!services) {
    services = createServices(loadConfig());
    console.log('[Services] ✅ Ready, flags:', getFlagState());
  }
  return services;
}
