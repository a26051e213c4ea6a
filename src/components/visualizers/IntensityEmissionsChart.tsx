import {
  ComposedChart,
  Line,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from 'recharts';
import type { IntensityChartRowV1 } from '../../contracts/ScenarioOutputV1';

const INTENSITY_COLOUR = '#2d3748';
const BASELINE_BAR     = 'rgba(49,130,206,0.35)';
const SHIFTED_BAR      = 'rgba(229,62,62,0.35)';

interface Props {
  rows: IntensityChartRowV1[];
}

/**
 * Carbon intensity (left axis, line) with baseline and shifted hourly
 * emissions (right axis, bars).
 */
export default function IntensityEmissionsChart({ rows }: Props) {
  return (
    <div className="chart-card">
      <h4>Carbon intensity profile</h4>
      <ResponsiveContainer width="100%" height={280}>
        <ComposedChart data={rows} margin={{ top: 8, right: 16, bottom: 8, left: 0 }}>
          <CartesianGrid strokeDasharray="3 3" />
          <XAxis dataKey="label" tick={{ fontSize: 10 }} interval={1} angle={-45} textAnchor="end" height={48} />
          <YAxis yAxisId="ci" tick={{ fontSize: 10 }} label={{ value: 'gCO₂/kWh', angle: -90, position: 'insideLeft', fontSize: 11 }} />
          <YAxis yAxisId="em" orientation="right" tick={{ fontSize: 10 }} label={{ value: 'Emissions (gCO₂)', angle: 90, position: 'insideRight', fontSize: 11 }} />
          <Tooltip />
          <Legend />
          <Bar yAxisId="em" dataKey="baselineEmissionsG" name="Baseline emissions" fill={BASELINE_BAR} />
          <Bar yAxisId="em" dataKey="shiftedEmissionsG" name="Shifted emissions" fill={SHIFTED_BAR} />
          <Line
            yAxisId="ci"
            type="monotone"
            dataKey="intensityGPerKwh"
            name="Carbon intensity (gCO₂/kWh)"
            stroke={INTENSITY_COLOUR}
            dot
          />
        </ComposedChart>
      </ResponsiveContainer>
    </div>
  );
}
