import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ReferenceLine,
  ResponsiveContainer,
} from 'recharts';
import type { LoadChartRowV1 } from '../../contracts/ScenarioOutputV1';

const BASELINE_COLOUR = '#3182ce';
const SHIFTED_COLOUR  = '#e53e3e';
const TARGET_COLOUR   = '#48bb78';

interface Props {
  rows: LoadChartRowV1[];
}

/**
 * Household load before and after shifting (kWh per hour).
 * Target hours are marked with dashed verticals.
 */
export default function LoadShiftChart({ rows }: Props) {
  return (
    <div className="chart-card">
      <h4>Household load before and after shifting</h4>
      <ResponsiveContainer width="100%" height={280}>
        <LineChart data={rows} margin={{ top: 8, right: 16, bottom: 8, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" />
          {rows.filter(r => r.isTarget).map(r => (
            <ReferenceLine key={r.label} x={r.label} stroke={TARGET_COLOUR} strokeDasharray="4 2" />
          ))}
          <XAxis dataKey="label" tick={{ fontSize: 10 }} interval={1} angle={-45} textAnchor="end" height={48} />
          <YAxis tick={{ fontSize: 10 }} label={{ value: 'Load (kWh)', angle: -90, position: 'insideLeft', fontSize: 11 }} />
          <Tooltip formatter={value => (typeof value === 'number' ? `${value.toFixed(3)} kWh` : String(value))} />
          <Legend />
          <Line type="monotone" dataKey="baselineKwh" name="Baseline load" stroke={BASELINE_COLOUR} dot />
          <Line type="monotone" dataKey="shiftedKwh" name="Shifted load" stroke={SHIFTED_COLOUR} dot />
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
