import { Component } from 'react';
import type { ErrorInfo, ReactNode } from 'react';

interface State { error: Error | null }

/**
 * Last-resort boundary for anything evaluateDay does not turn into an inline
 * alert (rendering bugs, chart failures).
 */
export default class ScenarioErrorBoundary extends Component<{ children: ReactNode }, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error('Scenario view crashed', error, info.componentStack);
  }

  render() {
    const { error } = this.state;
    if (!error) return this.props.children;
    return (
      <div className="crash-panel">
        <h2>Something went wrong</h2>
        <p>The simulator could not render this scenario. Reload to start again.</p>
        <button type="button" className="crash-panel__reload" onClick={() => window.location.reload()}>
          Reload
        </button>
        <details>
          <summary>Error details</summary>
          <pre>{error.message}</pre>
        </details>
      </div>
    );
  }
}
