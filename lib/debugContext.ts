// lib/debugContext.ts
// Structured debug context for concise JSON logging

export type DebugContext = {
  productName?: string;

  // Pipeline stages
  pipeline: {
    classified: boolean;
    lookupAttempted: boolean;
    matchAttempted: boolean;
    sources?: Record<string, number>; // codes per source
  };

  // Results
  result: {
    hsCodes: string[];
    candidates: number;
    bestCode?: string | null;
  };

  // Timing breakdown
  timing: {
    startTime: number;
    classifySeconds?: number;
    lookupSeconds?: number;
    matchSeconds?: number;
    totalSeconds?: number;
  };
};

/**
 * Create a new debug context with initial values
 */
export function createDebugContext(productName?: string): DebugContext {
  return {
    productName,
    pipeline: {
      classified: false,
      lookupAttempted: false,
      matchAttempted: false,
    },
    result: {
      hsCodes: [],
      candidates: 0,
    },
    timing: {
      startTime: Date.now(),
    },
  };
}

/**
 * Seconds since `since` (epoch ms), for filling in a timing slot
 */
export function secondsSince(since: number): number {
  return (Date.now() - since) / 1000;
}

/**
 * Build the summary object printed at the end of a request
 *
 * Example output:
 * {
 *   "product_name": "wireless mouse",
 *   "hs_codes": ["847160"],
 *   "candidates": 3,
 *   "best_code": "8471607000",
 *   "pipeline": {
 *     "classified": true,
 *     "lookup_attempted": true,
 *     "match_attempted": true,
 *     "sources": { "openai": 1, "claude": 1 }
 *   },
 *   "timing": {
 *     "total_seconds": 9.4,
 *     "classify_seconds": 6.2,
 *     "lookup_seconds": 0,
 *     "match_seconds": 3.2
 *   }
 * }
 */
export function buildSummary(ctx: DebugContext): Record<string, unknown> {
  const totalSeconds = ctx.timing.totalSeconds ?? secondsSince(ctx.timing.startTime);

  const pipeline: Record<string, unknown> = {
    classified: ctx.pipeline.classified,
    lookup_attempted: ctx.pipeline.lookupAttempted,
    match_attempted: ctx.pipeline.matchAttempted,
  };
  if (ctx.pipeline.sources && Object.keys(ctx.pipeline.sources).length > 0) {
    pipeline.sources = ctx.pipeline.sources;
  }

  const timing: Record<string, number> = {
    total_seconds: Number(totalSeconds.toFixed(1)),
  };
  if (ctx.timing.classifySeconds !== undefined) {
    timing.classify_seconds = Number(ctx.timing.classifySeconds.toFixed(1));
  }
  if (ctx.timing.lookupSeconds !== undefined) {
    timing.lookup_seconds = Number(ctx.timing.lookupSeconds.toFixed(1));
  }
  if (ctx.timing.matchSeconds !== undefined) {
    timing.match_seconds = Number(ctx.timing.matchSeconds.toFixed(1));
  }

  const summary: Record<string, unknown> = {
    product_name: ctx.productName,
    hs_codes: ctx.result.hsCodes,
    candidates: ctx.result.candidates,
  };
  if (ctx.result.bestCode !== undefined) {
    summary.best_code = ctx.result.bestCode;
  }
  summary.pipeline = pipeline;
  summary.timing = timing;

  return summary;
}

export function printClassificationSummary(ctx: DebugContext): void {
  console.log('\n=== CLASSIFICATION SUMMARY ===');
  console.log(JSON.stringify(buildSummary(ctx), null, 2));
  console.log('==============================\n');
}
