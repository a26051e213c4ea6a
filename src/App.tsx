import { useMemo, useState } from 'react';
import ScenarioControls from './components/ScenarioControls';
import ScenarioMetrics from './components/ScenarioMetrics';
import LoadShiftChart from './components/visualizers/LoadShiftChart';
import IntensityEmissionsChart from './components/visualizers/IntensityEmissionsChart';
import { PREFERRED_DEFAULT_DATE, SCENARIO_DEFAULTS, type ScenarioSettings } from './engine/config/scenarioDefaults';
import { evaluateDay } from './engine/Engine';
import { loadDataset, resolveDefaultDate, type AlignedDataset } from './engine/normalizer/DatasetNormalizer';
import sampleGridData from './data/sampleGridData.json';
import './index.css';

// Bundled sample: a few UTC days of grid generation mix and carbon intensity.
const datasetLoad = loadDataset(sampleGridData);

function Simulator({ dataset }: { dataset: AlignedDataset }) {
  const [date, setDate] = useState<string>(
    resolveDefaultDate(dataset.availableDates, PREFERRED_DEFAULT_DATE) ?? '',
  );
  const [settings, setSettings] = useState<ScenarioSettings>(SCENARIO_DEFAULTS);

  const evaluation = useMemo(
    () => evaluateDay(dataset, { date, ...settings }),
    [dataset, date, settings],
  );

  return (
    <div className="app-body">
      <ScenarioControls
        availableDates={dataset.availableDates}
        date={date}
        onDateChange={setDate}
        settings={settings}
        onChange={setSettings}
      />

      <main className="app-main">
        {evaluation.status === 'error' ? (
          <div className="alert alert--error" role="alert">{evaluation.message}</div>
        ) : (
          <>
            <ScenarioMetrics output={evaluation.output} />
            <LoadShiftChart rows={evaluation.output.loadChart} />
            <IntensityEmissionsChart rows={evaluation.output.intensityChart} />
            <ul className="scenario-notes">
              {evaluation.output.notes.map((note, i) => <li key={i}>{note}</li>)}
            </ul>
          </>
        )}
      </main>
    </div>
  );
}

export default function App() {
  return (
    <div className="app-shell">
      <header className="app-header">
        <h1>Grid Carbon Intensity – Household Load Shifting Simulator</h1>
        <p>
          Simulates how shifting flexible household electricity use into lower-carbon
          or higher-renewable hours changes daily CO₂ emissions.
        </p>
      </header>

      {datasetLoad.status === 'error' ? (
        <div className="alert alert--error" role="alert">{datasetLoad.message}</div>
      ) : (
        <Simulator dataset={datasetLoad.dataset} />
      )}
    </div>
  );
}
