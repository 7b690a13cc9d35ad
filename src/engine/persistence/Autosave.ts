import type { ConversionEngine } from '../ConversionEngine';

export interface AutosaveOptions {
  /** Receives every failed save; later changes still trigger new saves. */
  onError: (err: unknown) => void;
}

export interface AutosaveHandle {
  /** Resolves once every save queued so far has settled. */
  flush(): Promise<void>;
  detach(): void;
}

/**
 * Persist the engine after each change.
 *
 * Saves run one after another on a single promise chain, so two saves never
 * interleave their field writes. Changes caused by load() are not written
 * back.
 */
export function attachAutosave(engine: ConversionEngine, options: AutosaveOptions): AutosaveHandle {
  let queue: Promise<void> = Promise.resolve();

  const unsubscribe = engine.subscribe(event => {
    if (event.reason === 'load') return;
    queue = queue
      .then(() => engine.save())
      .catch((err: unknown) => {
        options.onError(err);
      });
  });

  return {
    flush: () => queue,
    detach: unsubscribe,
  };
}
