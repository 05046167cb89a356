// lib/handlers.ts
// API route logic, parameterised over the service graph so tests can supply fakes

import type { NextApiRequest, NextApiResponse } from 'next';
import { classifyProduct, type ClassificationServices, type ProductInfoPayload } from './classifyProduct';

export type ProcessOut = { product_info: ProductInfoPayload } | { error: string };

export type ClassifyOut =
  | { commodity_code: string | null; description: string | null; reasoning: string | null }
  | { error: string };

export type HandlerResult<T> = { status: number; body: T };

export type ServicesProvider = () => ClassificationServices;

function readProductName(body: unknown): string | undefined {
  if (!body || typeof body !== 'object' || !('product_name' in body)) return undefined;
  const value = body.product_name;
  return typeof value === 'string' ? value : undefined;
}

/**
 * POST /process with a form-encoded `product_name`
 */
export async function handleProcess(
  method: string | undefined,
  body: unknown,
  getServices: ServicesProvider
): Promise<HandlerResult<ProcessOut>> {
  if (method !== 'POST') return { status: 405, body: { error: 'Method not allowed' } };

  const productName = (readProductName(body) ?? '').trim();
  if (!productName) {
    return { status: 400, body: { error: 'Please enter a valid product name.' } };
  }

  const t0 = Date.now();
  try {
    const productInfo = await classifyProduct(productName, getServices());
    if (!productInfo) {
      return { status: 400, body: { error: 'Error processing product information.' } };
    }

    console.log('[PROCESS] done', {
      productName,
      bestCode: productInfo.best_commodity_code,
      ms: Date.now() - t0
    });
    return { status: 200, body: { product_info: productInfo } };
  } catch (e: unknown) {
    console.error('[PROCESS] ❌ Error:', e);
    return { status: 500, body: { error: 'Internal server error' } };
  }
}

/**
 * POST /api/classify with a JSON `{ product_name }`
 */
export async function handleClassify(
  method: string | undefined,
  body: unknown,
  getServices: ServicesProvider
): Promise<HandlerResult<ClassifyOut>> {
  if (method !== 'POST') return { status: 405, body: { error: 'Method not allowed' } };

  try {
    const rawName = readProductName(body);
    if (rawName === undefined) {
      return { status: 400, body: { error: 'Product name is required' } };
    }

    const productName = rawName.trim();
    if (!productName) {
      return { status: 400, body: { error: 'Product name cannot be empty' } };
    }

    const productInfo = await classifyProduct(productName, getServices());
    if (!productInfo) {
      return { status: 400, body: { error: 'Could not classify product' } };
    }

    if (productInfo.matching_commodity_info.length === 0) {
      return { status: 404, body: { error: 'No matching commodity code found' } };
    }

    const best = productInfo.matching_commodity_info.find(([code]) => code === productInfo.best_commodity_code);

    return {
      status: 200,
      body: {
        commodity_code: productInfo.best_commodity_code,
        description: best ? best[1] : null,
        reasoning: productInfo.best_commodity_reasoning
      }
    };
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    console.error('[CLASSIFY] ❌ Error:', message);
    return { status: 500, body: { error: `Internal server error: ${message}` } };
  }
}

export function createProcessHandler(getServices: ServicesProvider) {
  return async function handler(req: NextApiRequest, res: NextApiResponse<ProcessOut>) {
    const { status, body } = await handleProcess(req.method, req.body, getServices);
    res.status(status).json(body);
  };
}

export function createClassifyHandler(getServices: ServicesProvider) {
  return async function handler(req: NextApiRequest, res: NextApiResponse<ClassifyOut>) {
    const { status, body } = await handleClassify(req.method, req.body, getServices);
    res.status(status).json(body);
  };
}
