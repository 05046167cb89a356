import { useState, type FormEvent } from 'react';
import ProductResults from '../components/ProductResults';
import { submitProductName } from '../lib/api';
import type { ProductInfoPayload } from '../lib/classifyProduct';

type Status = 'idle' | 'loading' | 'success' | 'error';

export default function Home() {
  const [productName, setProductName] = useState('');
  const [status, setStatus] = useState<Status>('idle');
  const [error, setError] = useState<string | null>(null);
  const [productInfo, setProductInfo] = useState<ProductInfoPayload | null>(null);

  const handleSubmit = async (e: FormEvent) => {
    e.preventDefault();

    const name = productName.trim();
    if (!name) {
      setError('Please enter a product name.');
      setStatus('error');
      return;
    }

    setStatus('loading');
    setError(null);
    setProductInfo(null);

    try {
      const info = await submitProductName(name);
      setProductInfo(info);
      setStatus('success');
    } catch (err: unknown) {
      setError(err instanceof Error ? err.message : 'Something went wrong.');
      setStatus('error');
    }
  };

  return (
    <div className="min-h-screen bg-slate-50 p-6">
      <div className="max-w-3xl mx-auto">
        <div className="text-center mb-8">
          <h1 className="text-3xl font-bold text-slate-800 mb-2">HS Code Finder</h1>
          <p className="text-slate-600">Find the commodity code for a product</p>
        </div>

        <div className="bg-white rounded-2xl shadow-lg p-6 mb-6 border border-slate-200">
          <form id="product-form" onSubmit={handleSubmit} className="flex flex-col sm:flex-row gap-3">
            <input
              id="product-name-input"
              type="text"
              name="product_name"
              className="flex-1 border border-slate-300 rounded-lg px-4 py-3 focus:outline-none focus:ring-2 focus:ring-emerald-500 focus:border-transparent"
              placeholder="e.g. wireless mouse"
              value={productName}
              onChange={(e) => setProductName(e.target.value)}
            />
            <button
              type="submit"
              disabled={status === 'loading'}
              className="bg-emerald-500 text-white px-6 py-3 rounded-lg font-semibold hover:bg-emerald-600 disabled:opacity-60 disabled:cursor-not-allowed transition-colors shadow-md"
            >
              {status === 'loading' ? 'Searching...' : 'Find Code'}
            </button>
          </form>

          {error && (
            <p id="error-message" className="mt-3 text-sm text-red-600">{error}</p>
          )}
        </div>

        {status === 'loading' && (
          <div id="loading" className="flex items-center justify-center gap-2 text-slate-600 py-8">
            <span className="w-5 h-5 border-2 border-emerald-500 border-t-transparent rounded-full animate-spin"></span>
            <span>Classifying product...</span>
          </div>
        )}

        {status === 'success' && productInfo && <ProductResults productInfo={productInfo} />}
      </div>
    </div>
  );
}
