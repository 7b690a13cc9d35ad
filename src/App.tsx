import { useEffect, useState } from 'react';
import { useConversionEngine } from './components/EngineProvider';
import AnalyticsPanel from './components/panels/AnalyticsPanel';
import CompositionPanel from './components/panels/CompositionPanel';
import LandfillReductionPanel from './components/panels/LandfillReductionPanel';
import SettingsCard from './components/panels/SettingsCard';
import ProcessSteps from './components/panels/ProcessSteps';
import { attachAutosave } from './engine/persistence/Autosave';
import { SAMPLE_DATA_URL } from './ui/ui.catalog';
import './App.css';

async function fetchText(url: string): Promise<string> {
  const res = await fetch(url);
  if (!res.ok) throw new Error(`GET ${url} failed with ${res.status}`);
  return res.text();
}

export default function App() {
  const engine = useConversionEngine();
  const [message, setMessage] = useState<string | null>(null);

  // Restore saved state, then persist every later change.
  useEffect(() => {
    let active = true;
    void engine.load().catch((err: unknown) => {
      console.warn('Saved state could not be restored; using defaults.', err);
      if (active) setMessage('Saved data unavailable, using defaults');
    });
    const autosave = attachAutosave(engine, {
      onError: err => {
        console.error('Autosave failed', err);
        if (active) setMessage('Changes could not be saved on this device');
      },
    });
    return () => {
      active = false;
      autosave.detach();
    };
  }, [engine]);

  async function handleLoadSample() {
    try {
      const result = await engine.loadFromAsset(() => fetchText(SAMPLE_DATA_URL));
      setMessage(result.ok ? 'Sample data loaded' : result.message);
    } catch (err) {
      console.warn('Sample data could not be read', err);
      setMessage('Sample data could not be loaded');
    }
  }

  return (
    <div className="app">
      <header className="app-bar">
        <h1>Smart Bio Bricks</h1>
        <div className="app-bar__actions">
          <button className="icon-btn" title="Load sample data" onClick={() => { void handleLoadSample(); }}>
            ⤒ Sample data
          </button>
          <button className="icon-btn" title="Reset to defaults" onClick={() => engine.resetToDefaults()}>
            ↻ Reset
          </button>
        </div>
      </header>

      <main className="app-body">
        <AnalyticsPanel />
        <CompositionPanel onMessage={setMessage} />
        <LandfillReductionPanel />
        <SettingsCard onMessage={setMessage} />
        <ProcessSteps />
      </main>

      {message && (
        <div className="snackbar" role="status" onClick={() => setMessage(null)}>
          {message}
        </div>
      )}
    </div>
  );
}
