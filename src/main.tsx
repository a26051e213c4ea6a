import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import ScenarioErrorBoundary from './components/ScenarioErrorBoundary';

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

function showFatal(reason: unknown) {
  const pre = document.createElement('pre');
  pre.className = 'fatal-error';
  pre.textContent = reason instanceof Error ? reason.stack ?? reason.message : String(reason);
  container?.replaceChildren(pre);
}

window.addEventListener('error', e => showFatal(e.error ?? e.message));
window.addEventListener('unhandledrejection', e => showFatal(e.reason));

createRoot(container).render(
  <StrictMode>
    <ScenarioErrorBoundary>
      <App />
    </ScenarioErrorBoundary>
  </StrictMode>,
);
