import { useState } from 'react';
import type { KeyboardEvent } from 'react';
import { planFieldCommit } from '../../ui/format';

interface NumericFieldProps {
  value: number;
  ariaLabel: string;
  /** Returns false when the value was rejected; the field then shows `value` again. */
  onCommit: (value: number) => boolean;
  onInvalid: (text: string) => void;
}

/**
 * Free-text number input that commits on Enter or blur.
 * Parent components remount it (via `key`) when the engine value changes
 * underneath it, e.g. after a reset or import.
 */
export default function NumericField({ value, ariaLabel, onCommit, onInvalid }: NumericFieldProps) {
  const [text, setText] = useState(String(value));

  function commit() {
    const plan = planFieldCommit(text, value);
    if (plan.kind === 'invalid') {
      onInvalid(text);
      setText(String(value));
    } else if (plan.kind === 'commit' && !onCommit(plan.value)) {
      setText(String(value));
    }
  }

  function handleKeyDown(e: KeyboardEvent<HTMLInputElement>) {
    if (e.key === 'Enter') commit();
  }

  return (
    <input
      className="numeric-field"
      inputMode="decimal"
      aria-label={ariaLabel}
      value={text}
      onChange={e => setText(e.target.value)}
      onKeyDown={handleKeyDown}
      onBlur={commit}
    />
  );
}
