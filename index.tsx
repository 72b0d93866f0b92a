import React from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import ConfigurationError from './components/ConfigurationError';
import { createProblemProvider, loadConfig, readEnv } from './services/config';
import { SessionState } from './services/sessionState';

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error("Could not find root element to mount to");
}

const root = createRoot(rootElement);

let session: SessionState;
try {
  const config = loadConfig(readEnv());
  session = new SessionState(createProblemProvider(config));
  console.log(`[Startup] Using ${config.provider} provider with model ${config.model}`);
} catch (error) {
  // Startup aborts: no session is created without a working provider.
  console.error("[Startup] Fatal configuration error:", error);
  root.render(<ConfigurationError message={error instanceof Error ? error.message : String(error)} />);
  throw error;
}

root.render(
  <React.StrictMode>
    <App session={session} />
  </React.StrictMode>
);
