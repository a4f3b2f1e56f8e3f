'use client';

import { useCallback, useEffect, useRef, useState } from 'react';
import HoldingsTable from './HoldingsTable';
import TrendChart from './TrendChart';
import { calculateGainLoss, formatCurrency } from '@/lib/format';
import { startPolling } from '@/lib/polling';
import type { PortfolioSuggestion, StrategyId, WeightingMode } from '@/lib/types/portfolio';

interface StrategyOption {
  id: StrategyId;
  label: string;
  description: string;
  mode: 'static' | 'screening';
}

interface StrategiesResponse {
  strategies: StrategyOption[];
  minInvestmentUsd: number;
  maxStrategies: number;
}

interface SuggestionResponse {
  suggestion?: PortfolioSuggestion;
  error?: string;
  message?: string;
}

const REFRESH_INTERVALS = [15, 30, 60, 120];

export default function PortfolioDashboard() {
  const [options, setOptions] = useState<StrategiesResponse | null>(null);
  const [amount, setAmount] = useState<number>(10000);
  const [selected, setSelected] = useState<StrategyId[]>([]);
  const [weighting, setWeighting] = useState<WeightingMode>('equal');
  const [suggestion, setSuggestion] = useState<PortfolioSuggestion | null>(null);
  const [submittedAmount, setSubmittedAmount] = useState<number>(0);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [autoRefresh, setAutoRefresh] = useState(false);
  const [refreshInterval, setRefreshInterval] = useState(30);
  const [lastUpdated, setLastUpdated] = useState<Date | null>(null);
  const requestRef = useRef<{ amount: number; strategies: StrategyId[]; weighting: WeightingMode } | null>(null);

  // Load strategy catalogue on mount
  useEffect(() => {
    fetch('/api/strategies')
      .then((res) => res.json())
      .then((data: StrategiesResponse) => {
        setOptions(data);
        setAmount((current) => Math.max(current, data.minInvestmentUsd));
      })
      .catch((err: unknown) => {
        setError(err instanceof Error ? err.message : 'Failed to load strategies');
      });
  }, []);

  const requestSuggestion = useCallback(async () => {
    const request = requestRef.current;
    if (!request) return;

    setLoading(true);
    setError(null);
    try {
      const res = await fetch('/api/suggest-portfolio', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          investment_amount: request.amount,
          strategies: request.strategies,
          weighting: request.weighting,
        }),
      });
      const data: SuggestionResponse = await res.json();

      if (!res.ok || !data.suggestion) {
        setError(data.message || data.error || `Request failed with status ${res.status}`);
        return;
      }

      setSuggestion(data.suggestion);
      setSubmittedAmount(request.amount);
      setLastUpdated(new Date());
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Could not reach the suggestion service');
    } finally {
      setLoading(false);
    }
  }, []);

  // Poll while auto-refresh is on; requestRef holds the last submitted request
  useEffect(() => {
    if (!autoRefresh) return;
    return startPolling(refreshInterval, () => requestRef.current !== null, requestSuggestion);
  }, [autoRefresh, refreshInterval, requestSuggestion]);

  const maxStrategies = options?.maxStrategies ?? 2;

  const toggleStrategy = (id: StrategyId) => {
    setSelected((current) => {
      if (current.includes(id)) {
        return current.filter((s) => s !== id);
      }
      if (current.length >= maxStrategies) {
        // Replace the oldest pick
        return [...current.slice(1), id];
      }
      return [...current, id];
    });
  };

  const handleSubmit = (event: React.FormEvent) => {
    event.preventDefault();
    if (selected.length === 0) {
      setError('Select at least one strategy');
      return;
    }
    requestRef.current = { amount, strategies: selected, weighting };
    void requestSuggestion();
  };

  const gainLoss = suggestion
    ? calculateGainLoss(suggestion.currentTotalValueUsd + suggestion.leftoverCashUsd, submittedAmount)
    : null;

  return (
    <div className="grid md:grid-cols-[320px_1fr] gap-6">
      <form onSubmit={handleSubmit} className="bg-white border rounded-lg p-4 space-y-4 h-fit">
        <div>
          <label className="block text-sm font-medium mb-1" htmlFor="amount">
            Investment amount (USD)
          </label>
          <input
            id="amount"
            type="number"
            min={options?.minInvestmentUsd ?? 5000}
            step={500}
            value={amount}
            onChange={(e) => setAmount(Number(e.target.value))}
            className="w-full border rounded px-3 py-2"
          />
          {options && (
            <p className="text-xs text-gray-500 mt-1">
              Minimum {formatCurrency(options.minInvestmentUsd)}
            </p>
          )}
        </div>

        <fieldset>
          <legend className="text-sm font-medium mb-1">
            Strategies (pick up to {maxStrategies})
          </legend>
          <div className="space-y-2">
            {options?.strategies.map((strategy) => (
              <label key={strategy.id} className="flex items-start gap-2 text-sm">
                <input
                  type="checkbox"
                  checked={selected.includes(strategy.id)}
                  onChange={() => toggleStrategy(strategy.id)}
                  className="mt-1"
                />
                <span>
                  <span className="font-medium">{strategy.label}</span>
                  <span className="block text-xs text-gray-500">{strategy.description}</span>
                </span>
              </label>
            ))}
          </div>
        </fieldset>

        <div>
          <span className="block text-sm font-medium mb-1">Weighting</span>
          <div className="flex gap-4 text-sm">
            {(['equal', 'trend'] as const).map((mode) => (
              <label key={mode} className="flex items-center gap-1">
                <input
                  type="radio"
                  name="weighting"
                  checked={weighting === mode}
                  onChange={() => setWeighting(mode)}
                />
                {mode === 'equal' ? 'Equal weight' : 'Trend weight'}
              </label>
            ))}
          </div>
        </div>

        <button
          type="submit"
          disabled={loading}
          className="w-full bg-blue-600 text-white rounded py-2 font-medium hover:bg-blue-700 disabled:opacity-50"
        >
          {loading ? 'Generating...' : 'Generate Portfolio'}
        </button>

        <div className="border-t pt-4 space-y-2 text-sm">
          <label className="flex items-center gap-2">
            <input
              type="checkbox"
              checked={autoRefresh}
              onChange={(e) => setAutoRefresh(e.target.checked)}
            />
            Auto-refresh values
          </label>
          {autoRefresh && (
            <select
              value={refreshInterval}
              onChange={(e) => setRefreshInterval(Number(e.target.value))}
              className="border rounded px-2 py-1"
            >
              {REFRESH_INTERVALS.map((seconds) => (
                <option key={seconds} value={seconds}>Every {seconds}s</option>
              ))}
            </select>
          )}
        </div>
      </form>

      <section className="space-y-6">
        {error && (
          <div className="bg-red-50 border border-red-200 text-red-700 rounded p-3 text-sm">
            {error}
          </div>
        )}

        {!suggestion && !error && (
          <div className="text-gray-500 text-center py-16">
            Choose an amount and strategies to get a suggested portfolio
          </div>
        )}

        {suggestion && gainLoss && (
          <>
            <div className="grid grid-cols-2 lg:grid-cols-4 gap-4">
              <Metric label="Invested" value={formatCurrency(submittedAmount)} />
              <Metric label="Current value" value={formatCurrency(suggestion.currentTotalValueUsd)} />
              <Metric
                label="Gain / loss"
                value={`${formatCurrency(gainLoss.amount)} (${gainLoss.percent.toFixed(2)}%)`}
                tone={gainLoss.direction}
              />
              <Metric label="Leftover cash" value={formatCurrency(suggestion.leftoverCashUsd)} />
            </div>

            <div className="bg-white border rounded-lg p-4">
              <h2 className="text-lg font-semibold mb-3">Suggested holdings</h2>
              <HoldingsTable holdings={suggestion.suggestedHoldings} />
            </div>

            <div className="bg-white border rounded-lg p-4">
              <h2 className="text-lg font-semibold mb-3">Portfolio value, last {suggestion.weeklyValueTrend.length} days</h2>
              {suggestion.weeklyValueTrend.length > 0 ? (
                <TrendChart points={suggestion.weeklyValueTrend} />
              ) : (
                <p className="text-gray-500 text-sm">No historical prices available</p>
              )}
            </div>

            {lastUpdated && (
              <p className="text-xs text-gray-500">
                Last updated {lastUpdated.toLocaleTimeString()} · {suggestion.weighting} weighting
              </p>
            )}
          </>
        )}
      </section>
    </div>
  );
}

function Metric({ label, value, tone = 'flat' }: { label: string; value: string; tone?: 'up' | 'down' | 'flat' }) {
  const color = tone === 'up' ? 'text-green-600' : tone === 'down' ? 'text-red-600' : 'text-gray-900';
  return (
    <div className="bg-white border rounded-lg p-4">
      <div className="text-xs text-gray-500">{label}</div>
      <div className={`text-lg font-semibold ${color}`}>{value}</div>
    </div>
  );
}
