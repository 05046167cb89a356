// lib/flags.ts
/**
 * Feature Flags - Centralized Configuration
 * All feature flag reads go through this module for testability and consistency.
 *
 * All flags default to FALSE. Each one adds an extra LLM behaviour on top of the
 * baseline classification flow.
 *
 * Usage:
 *   import { flags } from './flags';
 *   if (flags.structuredPick) { ... }
 */

export const flags = {
  /**
   * Ask the model which General Interpretive Rule (1-6) classifies the product.
   * Costs one extra completion per request.
   */
  classificationRule: process.env.HS_FEATURE_CLASSIFICATION_RULE === 'true',

  /**
   * Ask the best-match model to end its answer with a "Best code: <code>" line.
   * The substring scan still runs when the line is missing or names an unknown code.
   */
  structuredPick: process.env.HS_FEATURE_STRUCTURED_PICK === 'true',

  /**
   * Print a JSON summary for every classification request
   */
  debugSummary: process.env.HS_DEBUG_SUMMARY === 'true'
};

/**
 * Override flags for testing (unit tests only)
 * DO NOT use in production code
 */
export function setTestFlags(overrides: Partial<typeof flags>): void {
  Object.assign(flags, overrides);
}

/**
 * Get current flag state as JSON (for debugging/logging)
 */
export function getFlagState(): Record<string, boolean> {
  return {
    classificationRule: flags.classificationRule,
    structuredPick: flags.structuredPick,
    debugSummary: flags.debugSummary
  };
}
