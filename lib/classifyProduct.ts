// lib/classifyProduct.ts
// End-to-end classification: product details → commodity candidates → best match

import type { BestMatchSelector, CandidateCode } from './bestMatch';
import type { CommodityCodeIndex, CommodityMatch } from './commodityCodes';
import type { ProductClassifier } from './productClassifier';
import { createDebugContext, printClassificationSummary, secondsSince } from './debugContext';
import { flags } from './flags';

export interface ClassificationServices {
  classifier: Pick<ProductClassifier, 'generateProductInfo'>;
  commodityCodes: Pick<CommodityCodeIndex, 'findMatching'>;
  selector: Pick<BestMatchSelector, 'findBestMatch'>;
}

/** JSON shape returned to the browser under `product_info` */
export interface ProductInfoPayload {
  name: string;
  type: string;
  information: string;
  matching_commodity_info: CommodityMatch[];
  best_commodity_code: string | null;
  best_commodity_reasoning: string | null;
  hs_codes: string[];
  classification_rule?: string;
  sources: Record<string, string[]>;
}

/**
 * Run the whole pipeline for one product name.
 * Returns null when the product itself could not be classified; errors from
 * the best-match call propagate.
 */
export async function classifyProduct(
  productName: string,
  services: ClassificationServices
): Promise<ProductInfoPayload | null> {
  const ctx = createDebugContext(productName);

  // Step 1: product type, description and HS codes
  let t = Date.now();
  const product = await services.classifier.generateProductInfo(productName);
  ctx.timing.classifySeconds = secondsSince(t);
  if (!product) return null;

  ctx.pipeline.classified = true;
  ctx.result.hsCodes = product.hsCodes;
  ctx.pipeline.sources = Object.fromEntries(
    Object.entries(product.sources).map(([name, codes]) => [name, codes.length])
  );

  const payload: ProductInfoPayload = {
    name: product.name,
    type: product.type,
    information: product.information,
    matching_commodity_info: [],
    best_commodity_code: null,
    best_commodity_reasoning: null,
    hs_codes: product.hsCodes,
    sources: product.sources
  };
  if (product.classificationRule !== undefined) {
    payload.classification_rule = product.classificationRule;
  }

  // Step 2: commodity codes filed under those HS codes
  if (product.hsCodes.length > 0) {
    t = Date.now();
    ctx.pipeline.lookupAttempted = true;
    payload.matching_commodity_info = services.commodityCodes.findMatching(product.hsCodes);
    ctx.result.candidates = payload.matching_commodity_info.length;
    ctx.timing.lookupSeconds = secondsSince(t);
  }

  // Step 3: let the model choose among the candidates
  if (payload.matching_commodity_info.length > 0) {
    t = Date.now();
    ctx.pipeline.matchAttempted = true;
    const candidates: CandidateCode[] = payload.matching_commodity_info.map(([code, description]) => ({
      code,
      description
    }));

    const result = await services.selector.findBestMatch(
      product.type,
      product.information,
      candidates.map(c => c.code),
      candidates
    );

    payload.best_commodity_code = result.bestCode;
    payload.best_commodity_reasoning = result.reasoning;
    ctx.result.bestCode = result.bestCode;
    ctx.timing.matchSeconds = secondsSince(t);
  }

  if (flags.debugSummary) printClassificationSummary(ctx);
  return payload;
}
