// lib/bestMatch.ts
// LLM-assisted selection of the best commodity code among lookup candidates

import type { CompletionClient } from './llmClient';
import { flags } from './flags';
import { formatHsCode } from './hsCode';

export interface CandidateCode {
  code: string;
  description: string;
}

export interface MatchResult {
  bestCode: string | null;
  reasoning: string;
}

export interface BestMatchOptions {
  client: CompletionClient;
  model: string;
  temperature: number;
  maxTokens: number;
}

export const NO_VALID_RESPONSE = 'no valid response';

const BEST_CODE_LINE = /^\s*\**best code\**\s*:\s*\**\s*([\d.]+|none)\b/im;

/**
 * Keep candidates that carry both a code and a description.
 * Each rejected entry gets its own diagnostic.
 */
export function validCandidates(candidates: Array<Partial<CandidateCode>>): CandidateCode[] {
  const valid: CandidateCode[] = [];
  candidates.forEach((entry, index) => {
    if (typeof entry.code === 'string' && entry.code && typeof entry.description === 'string') {
      valid.push({ code: entry.code, description: entry.description });
    } else {
      console.warn(`[BestMatch] Skipping candidate #${index}: missing code or description`, entry);
    }
  });
  return valid;
}

export function buildMatchPrompt(
  productType: string,
  productInfo: string,
  hsCodes: string[],
  candidates: CandidateCode[],
  options: { structured?: boolean } = {}
): string {
  let prompt = [
    `I have analyzed a product and its information:`,
    `Product type: ${productType}`,
    `Product information: ${productInfo}`,
    ``,
    `The extracted commodity codes are: ${hsCodes.join(', ')}`,
    `Here are the descriptions for each code:`,
    ``
  ].join('\n');

  for (const candidate of candidates) {
    prompt += `\n* Code: ${candidate.code}\n${candidate.description}`;
  }

  prompt +=
    '\nBased on the product type, information, and available commodity code descriptions, ' +
    'which code is the best match and why? Please explain your reasoning and highlight key ' +
    'similarities or discrepancies.';

  if (options.structured) {
    prompt += '\nFinish your answer with a final line of the form "Best code: <code>", or "Best code: none" if no code fits.';
  }

  return prompt;
}

/**
 * Pick the chosen code out of the model's reply.
 *
 * 1. An explicit "Best code: X" line naming a candidate wins.
 * 2. Otherwise the first candidate whose code appears verbatim in the reply.
 *    A 6-digit candidate that is also in `hsCodes` also counts when the reply
 *    cites it in dotted form ("8471.60").
 *
 * NOTE: rule 2 is a containment heuristic. A reply that lists several codes
 * while rejecting the first one still selects the first one.
 */
export function selectBestCode(
  reasoning: string,
  hsCodes: string[],
  candidates: CandidateCode[]
): string | null {
  const explicit = reasoning.match(BEST_CODE_LINE)?.[1];
  if (explicit && explicit.toLowerCase() !== 'none') {
    const named = candidates.find(c => c.code === explicit || formatHsCode(c.code) === explicit);
    if (named) return named.code;
  }

  for (const candidate of candidates) {
    if (reasoning.includes(candidate.code)) return candidate.code;

    const dotted = formatHsCode(candidate.code);
    if (dotted !== candidate.code && hsCodes.includes(candidate.code) && reasoning.includes(dotted)) {
      return candidate.code;
    }
  }

  return null;
}

export class BestMatchSelector {
  constructor(private readonly options: BestMatchOptions) {}

  /**
   * Ask the model which candidate fits the product best.
   *
   * Errors from the completion client (network, auth, rate limits) are not caught.
   */
  async findBestMatch(
    productType: string,
    productInfo: string,
    hsCodes: string[],
    candidates: Array<Partial<CandidateCode>>
  ): Promise<MatchResult> {
    const usable = validCandidates(candidates);
    const prompt = buildMatchPrompt(productType, productInfo, hsCodes, usable, {
      structured: flags.structuredPick
    });

    console.log('[BestMatch] 🤖 Selecting among', {
      candidates: usable.map(c => c.code),
      skipped: candidates.length - usable.length,
      model: this.options.model
    });

    const response = await this.options.client.complete({
      model: this.options.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens
    });

    if (response.choices.length === 0) {
      console.warn('[BestMatch] Model returned no choices');
      return { bestCode: null, reasoning: NO_VALID_RESPONSE };
    }

    const reasoning = response.choices[0].trim();
    const bestCode = selectBestCode(reasoning, hsCodes, usable);

    console.log('[BestMatch] ✅ Result:', { bestCode: bestCode ?? 'none' });
    return { bestCode, reasoning };
  }
}
