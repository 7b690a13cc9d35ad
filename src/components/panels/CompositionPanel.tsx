import { PieChart, Pie, Cell, ResponsiveContainer } from 'recharts';
import { useConversionEngine } from '../EngineProvider';
import { buildCompositionSlices } from '../../ui/composition/buildCompositionSlices';
import type { CompositionSlice } from '../../ui/composition/buildCompositionSlices';
import NumericField from './NumericField';

interface CompositionPanelProps {
  onMessage: (message: string) => void;
}

export default function CompositionPanel({ onMessage }: CompositionPanelProps) {
  const engine = useConversionEngine();
  const entries = engine.orderedEntries();
  const slices = buildCompositionSlices(entries);

  return (
    <section>
      <h2 className="section-title">Composition (tap to edit)</h2>
      <div className="card">
        <div style={{ height: 180 }}>
          <ResponsiveContainer width="100%" height="100%">
            <PieChart>
              <Pie
                data={slices}
                dataKey="value"
                nameKey="label"
                innerRadius={26}
                outerRadius={76}
                paddingAngle={2}
                animationDuration={300}
                label={({ payload }: { payload?: CompositionSlice }) => payload?.percentLabel ?? ''}
              >
                {slices.map(s => (
                  <Cell key={s.label} fill={s.color} />
                ))}
              </Pie>
            </PieChart>
          </ResponsiveContainer>
        </div>

        {entries.map(e => (
          <div key={e.label} className="editable-row">
            <span className="muted">{e.label}</span>
            <NumericField
              key={`${e.label}:${e.quantityKg}`}
              value={e.quantityKg}
              ariaLabel={`${e.label} (kg)`}
              onCommit={v => {
                const result = engine.updateValue(e.label, v);
                if (!result.ok) onMessage(`Could not update ${e.label}`);
                return result.ok;
              }}
              onInvalid={() => onMessage('Enter a valid number')}
            />
          </div>
        ))}
      </div>
    </section>
  );
}
