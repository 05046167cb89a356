// lib/api.ts
// Browser-side calls to the classification endpoint

import type { ProductInfoPayload } from './classifyProduct';

export type ProcessResponse = {
  product_info?: ProductInfoPayload;
  error?: string;
};

/**
 * POST the product name as a form field and return the classification.
 * Throws with the server's error text when the response carries one.
 */
export async function submitProductName(productName: string): Promise<ProductInfoPayload> {
  const res = await fetch('/process', {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({ product_name: productName }).toString(),
  });

  const json: ProcessResponse = await res.json();
  if (json.error) throw new Error(json.error);
  if (!res.ok || !json.product_info) throw new Error(`Request failed (${res.status})`);
  return json.product_info;
}
