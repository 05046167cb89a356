// components/ProductResults.tsx
// Renders a classification result into fixed regions: details, matching codes, best match, HS codes

import React from 'react';
import type { ProductInfoPayload } from '../lib/classifyProduct';
import { formatHsCode } from '../lib/hsCode';
import CodeChip from './CodeChip';

interface ProductResultsProps {
  productInfo: ProductInfoPayload;
}

export default function ProductResults({ productInfo }: ProductResultsProps) {
  const {
    name,
    type,
    information,
    matching_commodity_info: matches,
    best_commodity_code: bestCode,
    best_commodity_reasoning: reasoning,
    hs_codes: hsCodes,
    classification_rule: rule,
  } = productInfo;

  return (
    <div className="space-y-6">
      {/* Product details */}
      <section id="product-details" className="bg-white rounded-2xl shadow-lg p-6 border border-slate-200">
        <h2 className="text-xl font-bold text-slate-800 mb-4">Product Details</h2>
        <p className="text-sm text-slate-500">Name</p>
        <p id="product-name" className="font-semibold text-slate-800 mb-3">{name}</p>
        <p className="text-sm text-slate-500">Type</p>
        <p id="product-type" className="text-slate-700 mb-3 whitespace-pre-line">{type}</p>
        <p className="text-sm text-slate-500">Information</p>
        <p id="product-information" className="text-slate-700 whitespace-pre-line">{information}</p>
      </section>

      {/* Best match */}
      <section id="best-match" className="bg-emerald-50 rounded-2xl shadow-lg p-6 border border-emerald-200">
        <h2 className="text-xl font-bold text-emerald-800 mb-4">Best Match</h2>
        {bestCode ? (
          <p id="best-match-code" className="mb-3">
            <CodeChip code={bestCode} highlighted />
          </p>
        ) : (
          <p id="best-match-code" className="text-slate-600 italic mb-3">No best match determined.</p>
        )}
        {reasoning && (
          <p id="best-match-reasoning" className="text-slate-700 whitespace-pre-line">{reasoning}</p>
        )}
      </section>

      {/* Matching commodity codes */}
      <section id="matching-codes" className="bg-white rounded-2xl shadow-lg p-6 border border-slate-200">
        <h2 className="text-xl font-bold text-slate-800 mb-4">Matching Commodity Codes</h2>
        {matches.length === 0 ? (
          <p className="text-slate-600">No matching commodity codes found.</p>
        ) : (
          <ul className="space-y-3">
            {matches.map(([code, description]) => (
              <li key={code} className="flex gap-3 items-start">
                <CodeChip code={code} highlighted={code === bestCode} />
                <span className="text-slate-700">{description}</span>
              </li>
            ))}
          </ul>
        )}
      </section>

      {/* HS codes from the LLM sources */}
      <section id="hs-codes" className="bg-white rounded-2xl shadow-lg p-6 border border-slate-200">
        <h2 className="text-xl font-bold text-slate-800 mb-4">HS Codes</h2>
        {hsCodes.length === 0 ? (
          <p className="text-slate-600">No HS codes found</p>
        ) : (
          <ul className="flex flex-wrap gap-2">
            {hsCodes.map(code => (
              <li key={code}>
                <CodeChip code={formatHsCode(code)} />
              </li>
            ))}
          </ul>
        )}
        {rule && (
          <div id="classification-rule" className="mt-4">
            <p className="text-sm text-slate-500">Classification Rule</p>
            <p className="text-slate-700 whitespace-pre-line">{rule}</p>
          </div>
        )}
      </section>
    </div>
  );
}
