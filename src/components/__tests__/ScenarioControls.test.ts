import { describe, it, expect } from 'vitest';
import { createElement } from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import ScenarioControls from '../ScenarioControls';
import { SCENARIO_DEFAULTS } from '../../engine/config/scenarioDefaults';

function render(): string {
  return renderToStaticMarkup(
    createElement(ScenarioControls, {
      availableDates: ['2024-02-05', '2024-02-06'],
      date: '2024-02-05',
      onDateChange: () => {},
      settings: { ...SCENARIO_DEFAULTS, ciSource: 'predicted', strategy: 'low_intensity' },
      onChange: () => {},
    }),
  );
}

describe('ScenarioControls – choice chips', () => {
  const html = render();

  it('marks only the selected source as pressed', () => {
    expect(html).toContain(
      '<button type="button" class="chip-btn chip-btn--active" aria-pressed="true">Model prediction</button>',
    );
    expect(html).toContain(
      '<button type="button" class="chip-btn" aria-pressed="false">Historical (actual)</button>',
    );
  });

  it('marks only the selected strategy as pressed', () => {
    expect(html).toContain(
      '<button type="button" class="chip-btn chip-btn--active" aria-pressed="true">Lowest-intensity hours</button>',
    );
    expect(html).toContain(
      '<button type="button" class="chip-btn" aria-pressed="false">Highest-renewables hours</button>',
    );
  });

  it('labels each chip row by its legend', () => {
    const groups = [...html.matchAll(/role="group" aria-labelledby="([^"]+)"/g)].map(m => m[1]);
    expect(groups).toHaveLength(2);
    for (const id of groups) {
      expect(html).toContain(`id="${id}"`);
    }
    expect(new Set(groups).size).toBe(2);
  });
});
