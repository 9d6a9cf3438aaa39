"use client";

import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
  ReferenceLine,
} from "recharts";
import type { SimulationResult } from "@/lib/model/engine";
import { formatCompactCurrency, formatCurrency, formatPeriodLabel } from "@/lib/utils/format";

interface BalanceChartProps {
  result: SimulationResult;
}

export function BalanceChart({ result }: BalanceChartProps) {
  const { rows, schedule, periodsPerYear, depletionPeriod } = result;
  const data = rows.map((row) => ({
    period: row.period,
    balanceNominal: row.balanceNominal,
    balanceReal: row.balanceReal,
  }));
  const tickEvery = periodsPerYear === 12 ? 60 : 5;

  return (
    <div className="min-h-80 h-80 min-w-0 w-full">
      <ResponsiveContainer
        width="100%"
        height="100%"
        minHeight={320}
        minWidth={0}
        initialDimension={{ width: 600, height: 320 }}
      >
        <LineChart data={data} margin={{ top: 8, right: 8, left: 8, bottom: 8 }}>
          <CartesianGrid strokeDasharray="3 3" className="stroke-border" />
          <XAxis
            dataKey="period"
            type="number"
            domain={["dataMin", "dataMax"]}
            allowDecimals={false}
            tickFormatter={(p) => String(Math.ceil(Number(p) / periodsPerYear))}
            interval="preserveStartEnd"
            ticks={data
              .filter((d) => d.period % tickEvery === 0)
              .map((d) => d.period)}
            tick={{ fontSize: 12 }}
            tickLine={false}
            axisLine={{ stroke: "currentColor", opacity: 0.3 }}
            className="text-content-muted"
            label={{ value: "Year", position: "insideBottomRight", offset: -4, fontSize: 11 }}
          />
          <YAxis
            tickFormatter={(v) => formatCompactCurrency(Number(v))}
            tick={{ fontSize: 12 }}
            tickLine={false}
            axisLine={false}
            className="text-content-muted"
          />
          <Tooltip
            contentStyle={{
              backgroundColor: "var(--surface-elevated)",
              border: "1px solid var(--border)",
              borderRadius: "6px",
            }}
            labelFormatter={(period) => formatPeriodLabel(Number(period), periodsPerYear)}
            formatter={(value) => formatCurrency(Number(value))}
          />
          <Legend wrapperStyle={{ fontSize: 12 }} />
          {schedule.accumulationPeriods > 0 && schedule.distributionPeriods > 0 && (
            <ReferenceLine
              x={schedule.accumulationPeriods}
              stroke="var(--primary)"
              strokeDasharray="5 5"
              label={{ value: "Retirement", position: "top", fontSize: 11 }}
            />
          )}
          {depletionPeriod != null && (
            <ReferenceLine
              x={depletionPeriod}
              stroke="#dc2626"
              strokeDasharray="3 3"
              label={{ value: "Depleted", position: "top", fontSize: 11 }}
            />
          )}
          <Line
            type="monotone"
            dataKey="balanceNominal"
            name="Balance (nominal)"
            stroke="var(--accent)"
            strokeWidth={2}
            dot={false}
          />
          <Line
            type="monotone"
            dataKey="balanceReal"
            name="Balance (today's $)"
            stroke="var(--primary)"
            strokeWidth={2}
            dot={false}
          />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
