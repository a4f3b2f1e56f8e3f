'use client';

import { useEffect, useRef } from 'react';
import { createChart, IChartApi, ISeriesApi, ColorType } from 'lightweight-charts';
import type { TrendPoint } from '@/lib/types/portfolio';

interface TrendChartProps {
  points: TrendPoint[];
  height?: number;
}

export default function TrendChart({ points, height = 300 }: TrendChartProps) {
  const containerRef = useRef<HTMLDivElement>(null);
  const chartRef = useRef<IChartApi | null>(null);
  const seriesRef = useRef<ISeriesApi<'Line'> | null>(null);

  // Initialize chart
  useEffect(() => {
    if (!containerRef.current) return;

    const chart = createChart(containerRef.current, {
      layout: {
        background: { type: ColorType.Solid, color: 'white' },
        textColor: 'black',
      },
      width: containerRef.current.clientWidth,
      height,
      grid: {
        vertLines: { color: '#e0e0e0' },
        horzLines: { color: '#e0e0e0' },
      },
      timeScale: {
        borderColor: '#d1d4dc',
        timeVisible: false,
      },
      rightPriceScale: {
        borderColor: '#d1d4dc',
        scaleMargins: { top: 0.1, bottom: 0.1 },
        minimumWidth: 80,
      },
    });

    const series = chart.addLineSeries({
      color: '#2196F3',
      lineWidth: 3,
    });

    chartRef.current = chart;
    seriesRef.current = series;

    const handleResize = () => {
      if (containerRef.current && chartRef.current) {
        chartRef.current.applyOptions({ width: containerRef.current.clientWidth });
      }
    };
    window.addEventListener('resize', handleResize);

    return () => {
      window.removeEventListener('resize', handleResize);
      chart.remove();
      chartRef.current = null;
      seriesRef.current = null;
    };
  }, [height]);

  // Update data
  useEffect(() => {
    if (!seriesRef.current || !chartRef.current) return;

    // Business-day strings (YYYY-MM-DD) avoid timezone shifts
    seriesRef.current.setData(
      points.map((point) => ({ time: point.date, value: point.portfolioValueUsd }))
    );
    chartRef.current.timeScale().fitContent();
  }, [points]);

  return <div ref={containerRef} className="w-full" />;
}
