import { createContext, useContext, useSyncExternalStore } from 'react';
import type { ReactNode } from 'react';
import type { ConversionEngine } from '../engine/ConversionEngine';

// ─── Context ──────────────────────────────────────────────────────────────────

const EngineContext = createContext<ConversionEngine | null>(null);

// ─── Provider ─────────────────────────────────────────────────────────────────

interface EngineProviderProps {
  engine: ConversionEngine;
  children: ReactNode;
}

/**
 * EngineProvider
 *
 * Hands the application's single ConversionEngine to the component tree.
 * The engine is built by the caller (main.tsx, or a test harness), so its
 * lifetime is explicit rather than module-global.
 */
export function EngineProvider({ engine, children }: EngineProviderProps) {
  return (
    <EngineContext.Provider value={engine}>
      {children}
    </EngineContext.Provider>
  );
}

// ─── Hook ─────────────────────────────────────────────────────────────────────

/**
 * Returns the engine from the nearest EngineProvider and re-renders the
 * caller after every engine change.
 */
// eslint-disable-next-line react-refresh/only-export-components
export function useConversionEngine(): ConversionEngine {
  const engine = useContext(EngineContext);
  if (!engine) {
    throw new Error('useConversionEngine must be used inside an <EngineProvider>');
  }
  useSyncExternalStore(engine.subscribe, () => engine.version);
  return engine;
}
