// components/CodeChip.tsx
// Pill tag for an HS or commodity code

import React from 'react';

interface CodeChipProps {
  code: string;
  highlighted?: boolean;
  size?: 'sm' | 'md';
  className?: string;
}

const sizeClasses = {
  sm: 'text-xs px-2 py-0.5',
  md: 'text-sm px-3 py-1'
};

export default function CodeChip({ code, highlighted = false, size = 'md', className = '' }: CodeChipProps) {
  const colorClasses = highlighted
    ? 'bg-emerald-100 text-emerald-800 ring-1 ring-emerald-400'
    : 'bg-slate-100 text-slate-700';

  return (
    <span
      className={`inline-flex items-center rounded-full font-mono font-medium shrink-0 ${colorClasses} ${sizeClasses[size]} ${className}`}
      title={highlighted ? `Best match: ${code}` : code}
    >
      {code}
    </span>
  );
}
