'use client';

import { formatCurrency } from '@/lib/format';
import type { Holding } from '@/lib/types/portfolio';

interface HoldingsTableProps {
  holdings: Holding[];
}

export default function HoldingsTable({ holdings }: HoldingsTableProps) {
  if (holdings.length === 0) {
    return (
      <p className="text-gray-500 text-sm">
        No whole shares could be bought with this amount.
      </p>
    );
  }

  return (
    <table className="min-w-full text-sm">
      <thead>
        <tr className="border-b text-left text-gray-600">
          <th className="py-2 pr-4">Ticker</th>
          <th className="py-2 pr-4 text-right">Shares</th>
          <th className="py-2 pr-4 text-right">Allocated</th>
          <th className="py-2 text-right">Weight</th>
        </tr>
      </thead>
      <tbody>
        {holdings.map((holding) => (
          <tr key={holding.ticker} className="border-b last:border-0">
            <td className="py-2 pr-4 font-mono font-semibold">{holding.ticker}</td>
            <td className="py-2 pr-4 text-right">{holding.sharesPurchased}</td>
            <td className="py-2 pr-4 text-right">{formatCurrency(holding.allocatedUsd)}</td>
            <td className="py-2 text-right">
              {holding.weightPct !== undefined ? `${holding.weightPct.toFixed(2)}%` : '-'}
            </td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
