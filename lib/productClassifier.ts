// lib/productClassifier.ts
// GPT-based product classification: product type, description and candidate HS codes

import type { CompletionClient } from './llmClient';
import { extractHsCodes, mergeHsCodes } from './hsCode';
import { flags } from './flags';

export interface HsCodeSource {
  name: string;
  client: CompletionClient;
  model: string;
}

export interface ProductClassification {
  name: string;
  type: string;
  information: string;
  hsCodes: string[];
  /** Codes each source proposed, keyed by source name */
  sources: Record<string, string[]>;
  classificationRule?: string;
}

export interface ProductClassifierOptions {
  client: CompletionClient;
  model: string;
  sources: HsCodeSource[];
}

export const CLASSIFICATION_RULE_UNAVAILABLE = 'Classification rule unavailable';

// Short factual answers; the HS code prompt only needs a few sentences of context
const TEMPERATURE = 0.5;
const MAX_TOKENS = 200;

function hsCodePrompt(productType: string, productInfo: string): string {
  return `Based on the HS Nomenclature 2017 edition, provide the most specific 6-digit HS code classification for ${productType} and ${productInfo}.`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ProductClassifier {
  constructor(private readonly options: ProductClassifierOptions) {}

  private async ask(system: string | null, user: string): Promise<string> {
    const response = await this.options.client.complete({
      model: this.options.model,
      messages: system
        ? [{ role: 'system', content: system }, { role: 'user', content: user }]
        : [{ role: 'user', content: user }],
      temperature: TEMPERATURE,
      maxTokens: MAX_TOKENS
    });

    const text = response.choices[0];
    if (text === undefined) throw new Error('Empty completion');
    return text.trim();
  }

  async getProductType(productName: string): Promise<string> {
    const productType = await this.ask(
      'You are an expert in product classification.',
      `What is the product type and category for ${productName}?`
    );
    console.log('[ProductClassifier] Product type:', productType);
    return productType;
  }

  async getProductInfo(productName: string): Promise<string> {
    const productInfo = await this.ask(
      'You are an expert in product descriptions.',
      `Provide detailed information about ${productName}, including material composition, primary use, and distinctive features.`
    );
    console.log('[ProductClassifier] Product information:', productInfo);
    return productInfo;
  }

  /**
   * Ask one source for an HS code. A failing source contributes no codes.
   */
  async getHsCodesFromSource(source: HsCodeSource, productType: string, productInfo: string): Promise<string[]> {
    try {
      const response = await source.client.complete({
        model: source.model,
        messages: [
          { role: 'system', content: 'You are an expert in HS code classification.' },
          { role: 'user', content: hsCodePrompt(productType, productInfo) }
        ],
        temperature: TEMPERATURE,
        maxTokens: MAX_TOKENS
      });
      const codes = extractHsCodes(response.choices[0]);
      console.log(`[ProductClassifier] HS codes from ${source.name}: ${codes.join(', ') || 'none'}`);
      return codes;
    } catch (error: unknown) {
      console.error(`[ProductClassifier] ❌ Error getting ${source.name} HS codes:`, errorMessage(error));
      return [];
    }
  }

  async getConsolidatedHsCodes(
    productType: string,
    productInfo: string
  ): Promise<{ hsCodes: string[]; sources: Record<string, string[]> }> {
    const results = await Promise.all(
      this.options.sources.map(source => this.getHsCodesFromSource(source, productType, productInfo))
    );

    const sources: Record<string, string[]> = {};
    this.options.sources.forEach((source, i) => {
      sources[source.name] = results[i];
    });

    return { hsCodes: mergeHsCodes(results), sources };
  }

  /**
   * Which General Interpretive Rule (1-6) classifies the product
   */
  async getClassificationRule(productType: string, productInfo: string): Promise<string> {
    try {
      return await this.ask(
        null,
        `Based on the general rules for the interpretation of the harmonized system, which rule, from 1-6, was used to classify the product? Product Type: ${productType}, Product Information: ${productInfo}`
      );
    } catch (error: unknown) {
      console.error('[ProductClassifier] ❌ Error getting classification rule:', errorMessage(error));
      return CLASSIFICATION_RULE_UNAVAILABLE;
    }
  }

  /**
   * Full classification for a product name, or null when the product type or
   * description cannot be generated.
   */
  async generateProductInfo(productName: string): Promise<ProductClassification | null> {
    console.log('[ProductClassifier] 🤖 Classifying:', productName);

    try {
      const type = await this.getProductType(productName);
      const information = await this.getProductInfo(productName);
      const { hsCodes, sources } = await this.getConsolidatedHsCodes(type, information);

      const classification: ProductClassification = {
        name: productName,
        type,
        information,
        hsCodes,
        sources
      };

      if (flags.classificationRule && hsCodes.length > 0) {
        classification.classificationRule = await this.getClassificationRule(type, information);
      }

      return classification;
    } catch (error: unknown) {
      console.error('[ProductClassifier] ❌ Error generating product information:', errorMessage(error));
      return null;
    }
  }
}
