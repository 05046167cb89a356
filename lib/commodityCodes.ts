// lib/commodityCodes.ts
// Commodity code reference data - maps 6-digit HS subheadings to national commodity codes

import fs from 'fs';
import { z } from 'zod';
import { normalizeHsCode } from './hsCode';

const CommodityRowSchema = z.object({
  hs_code: z.string().min(1),
  code: z.string().min(1),
  description: z.string()
});

export type CommodityRow = z.infer<typeof CommodityRowSchema>;

/** [commodity code, description] - the wire shape of matching_commodity_info */
export type CommodityMatch = [code: string, description: string];

export class CommodityCodeIndex {
  private readonly byHsCode = new Map<string, CommodityRow[]>();

  constructor(rows: CommodityRow[]) {
    for (const row of rows) {
      const key = normalizeHsCode(row.hs_code);
      if (!key) {
        console.warn('[CommodityCodes] Skipping row with unusable hs_code:', row);
        continue;
      }
      const bucket = this.byHsCode.get(key);
      if (bucket) bucket.push(row);
      else this.byHsCode.set(key, [row]);
    }
  }

  static fromFile(filePath: string): CommodityCodeIndex {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    const rows = z.array(CommodityRowSchema).parse(raw);
    console.log(`[CommodityCodes] Loaded ${rows.length} commodity codes from ${filePath}`);
    return new CommodityCodeIndex(rows);
  }

  get size(): number {
    let total = 0;
    for (const bucket of this.byHsCode.values()) total += bucket.length;
    return total;
  }

  /**
   * Every commodity code filed under the given HS codes.
   * Results follow the order of `hsCodes`, then file order.
   */
  findMatching(hsCodes: string[]): CommodityMatch[] {
    const matches: CommodityMatch[] = [];

    for (const hsCode of hsCodes) {
      const key = normalizeHsCode(hsCode);
      if (!key) {
        console.warn('[CommodityCodes] Ignoring malformed HS code:', hsCode);
        continue;
      }

      const rows = this.byHsCode.get(key) ?? [];
      if (rows.length === 0) {
        console.log(`[CommodityCodes] No matching code found for HS code ${key}`);
        continue;
      }

      console.log(`[CommodityCodes] Found ${rows.length} matches for HS code ${key}`);
      for (const row of rows) matches.push([row.code, row.description]);
    }

    return matches;
  }
}
