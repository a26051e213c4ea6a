/**
 * ScenarioControls.tsx
 *
 * Sidebar for one simulated day: date, carbon-intensity source, shifting
 * strategy and the three household sliders. Holds no state of its own.
 */
import { useId } from 'react';
import {
  CI_SOURCE_LABELS,
  SCENARIO_CONTROL_RANGES,
  STRATEGY_LABELS,
  type ControlRange,
  type ScenarioSettings,
} from '../engine/config/scenarioDefaults';
import type { CiSource, ShiftStrategyId } from '../engine/schema/ScenarioInputV1';

// ── Choice chips ──────────────────────────────────────────────────────────────

interface ChoiceOption<T extends string> {
  value: T;
  label: string;
}

interface ChoiceChipsProps<T extends string> {
  legend: string;
  options: readonly ChoiceOption<T>[];
  selected: T;
  onSelect: (value: T) => void;
}

/** Single-choice toggle row; each chip reports its state through aria-pressed. */
function ChoiceChips<T extends string>({ legend, options, selected, onSelect }: ChoiceChipsProps<T>) {
  const legendId = useId();
  return (
    <div className="form-field">
      <span className="form-field__label" id={legendId}>{legend}</span>
      <div className="chip-group" role="group" aria-labelledby={legendId}>
        {options.map(({ value, label }) => {
          const pressed = value === selected;
          return (
            <button
              key={value}
              type="button"
              className={pressed ? 'chip-btn chip-btn--active' : 'chip-btn'}
              aria-pressed={pressed}
              onClick={() => {
                if (!pressed) onSelect(value);
              }}
            >
              {label}
            </button>
          );
        })}
      </div>
    </div>
  );
}

function RangeField({
  label,
  range,
  value,
  format,
  hint,
  onChange,
}: {
  label: string;
  range: ControlRange;
  value: number;
  format: (v: number) => string;
  hint?: string;
  onChange: (v: number) => void;
}) {
  return (
    <div className="form-field">
      <label className="form-field__label">
        {label} <strong>{format(value)}</strong>
      </label>
      <input
        type="range"
        min={range.min}
        max={range.max}
        step={range.step}
        value={value}
        onChange={e => onChange(Number(e.target.value))}
      />
      {hint && <p className="form-field__hint">{hint}</p>}
    </div>
  );
}

// ── Panel ─────────────────────────────────────────────────────────────────────

const CI_SOURCES: CiSource[] = ['historical', 'predicted'];
const STRATEGIES: ShiftStrategyId[] = ['low_intensity', 'max_renewable'];

const CI_SOURCE_OPTIONS: ChoiceOption<CiSource>[] = CI_SOURCES.map(value => ({
  value,
  label: CI_SOURCE_LABELS[value].option,
}));

const STRATEGY_OPTIONS: ChoiceOption<ShiftStrategyId>[] = STRATEGIES.map(value => ({
  value,
  label: STRATEGY_LABELS[value],
}));

interface Props {
  availableDates: string[];
  date: string;
  onDateChange: (date: string) => void;
  settings: ScenarioSettings;
  onChange: (settings: ScenarioSettings) => void;
}

export default function ScenarioControls({ availableDates, date, onDateChange, settings, onChange }: Props) {
  function set<K extends keyof ScenarioSettings>(key: K, value: ScenarioSettings[K]) {
    onChange({ ...settings, [key]: value });
  }

  return (
    <aside className="scenario-controls">
      <h3>Scenario settings</h3>

      <div className="form-field">
        <label className="form-field__label" htmlFor="scenario-date">Select date</label>
        <select id="scenario-date" value={date} onChange={e => onDateChange(e.target.value)}>
          {availableDates.map(d => (
            <option key={d} value={d}>{d}</option>
          ))}
        </select>
      </div>

      <ChoiceChips
        legend="Carbon intensity source"
        options={CI_SOURCE_OPTIONS}
        selected={settings.ciSource}
        onSelect={v => set('ciSource', v)}
      />

      <ChoiceChips
        legend="Shifting strategy"
        options={STRATEGY_OPTIONS}
        selected={settings.strategy}
        onSelect={v => set('strategy', v)}
      />

      <RangeField
        label="Daily household consumption (kWh)"
        range={SCENARIO_CONTROL_RANGES.dailyEnergy}
        value={settings.dailyEnergy}
        format={v => v.toFixed(1)}
        onChange={v => set('dailyEnergy', v)}
      />

      <RangeField
        label="Flexible share of daily load"
        range={SCENARIO_CONTROL_RANGES.flexibleShare}
        value={settings.flexibleShare}
        format={v => `${Math.round(v * 100)}%`}
        hint="Fraction of daily consumption that can be shifted (e.g. laundry, dishwasher, EV charging)."
        onChange={v => set('flexibleShare', v)}
      />

      <RangeField
        label="Number of target hours"
        range={SCENARIO_CONTROL_RANGES.targetHourCount}
        value={settings.targetHourCount}
        format={v => String(v)}
        hint="How many of the best hours to concentrate shifted load into."
        onChange={v => set('targetHourCount', v)}
      />
    </aside>
  );
}
