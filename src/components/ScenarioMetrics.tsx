import type { ScenarioOutputV1 } from '../contracts/ScenarioOutputV1';

interface Props {
  output: ScenarioOutputV1;
}

/** Three summary tiles plus the scenario caption. */
export default function ScenarioMetrics({ output }: Props) {
  return (
    <section className="scenario-metrics">
      <div className="metric-row">
        {output.metrics.map(m => (
          <div key={m.id} className="metric-tile">
            <span className="metric-tile__label">{m.label}</span>
            <span className="metric-tile__value">{m.value}</span>
          </div>
        ))}
      </div>
      <p className="scenario-metrics__caption">{output.caption}</p>
    </section>
  );
}
