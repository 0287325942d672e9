import React from 'react';
import { BarChart, Bar, XAxis, YAxis, CartesianGrid, ReferenceDot, ReferenceLine } from 'recharts';
import { VALUATION_METHODS, type Maybe, type RangesByMethod, type ValuationMethod } from '../types';
import { isPresent } from '../utils/missing';
import { formatBillions } from '../utils/format';

export interface FootballFieldRow {
  method: ValuationMethod;
  low: number;
  base: Maybe;
  high: number;
  span: [number, number];
}

/** One floating bar per method; methods without both ends of the range are left out. */
export const buildFootballFieldRows = (ranges: RangesByMethod): FootballFieldRow[] => {
  const rows: FootballFieldRow[] = [];
  for (const method of VALUATION_METHODS) {
    const range = ranges[method];
    if (!isPresent(range.low) || !isPresent(range.high)) continue;
    const low = Math.min(range.low, range.high);
    const high = Math.max(range.low, range.high);
    rows.push({ method, low, base: range.base, high, span: [low, high] });
  }
  return rows;
};

export interface FootballFieldChartProps {
  title: string;
  ranges: RangesByMethod;
  spotEnterpriseValue: Maybe;
  width?: number;
  height?: number;
}

const FootballFieldChart: React.FC<FootballFieldChartProps> = ({
  title,
  ranges,
  spotEnterpriseValue,
  width = 800,
  height = 480
}) => {
  const rows = buildFootballFieldRows(ranges);

  return (
    <div className="football-field" style={{ fontFamily: 'sans-serif', color: '#0f172a' }}>
      <h2 style={{ fontSize: 16, marginBottom: 12 }}>{title}</h2>
      {rows.length === 0 ? (
        <p>No valuation method produced a usable range.</p>
      ) : (
        // Fixed dimensions: the chart is rendered to static markup, where ResponsiveContainer cannot measure.
        <BarChart layout="vertical" width={width} height={height} data={rows} margin={{ top: 20, right: 30, left: 60, bottom: 5 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#cbd5e1" horizontal={false} />
          <XAxis
            type="number"
            domain={['auto', 'auto']}
            stroke="#475569"
            fontSize={12}
            tickFormatter={(value: number) => formatBillions(value)}
          />
          <YAxis type="category" dataKey="method" stroke="#475569" fontSize={12} width={100} />
          <Bar dataKey="span" name="Implied EV range" fill="#60a5fa" fillOpacity={0.6} barSize={28} isAnimationActive={false} />
          {rows.map((row) =>
            isPresent(row.base) ? (
              <ReferenceDot key={row.method} x={row.base} y={row.method} r={5} fill="#1d4ed8" stroke="none" />
            ) : null
          )}
          {isPresent(spotEnterpriseValue) && (
            <ReferenceLine
              x={spotEnterpriseValue}
              ifOverflow="extendDomain"
              stroke="#dc2626"
              strokeDasharray="4 4"
              label={{ value: `Spot EV ${formatBillions(spotEnterpriseValue)}`, position: 'top', fontSize: 12 }}
            />
          )}
        </BarChart>
      )}
    </div>
  );
};

export default FootballFieldChart;
