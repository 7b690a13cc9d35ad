import { useConversionEngine } from '../EngineProvider';
import type { SettingName } from '../../engine/schema/ConversionModelV1';
import NumericField from './NumericField';

const SETTING_FIELDS: Array<{ name: SettingName; label: string }> = [
  { name: 'brickMass', label: 'Brick mass (kg)' },
  { name: 'brickVolume', label: 'Brick volume (m³)' },
  { name: 'landfillArea', label: 'Landfill area (m²)' },
  { name: 'landfillDepth', label: 'Landfill depth (m)' },
];

interface SettingsCardProps {
  onMessage: (message: string) => void;
}

export default function SettingsCard({ onMessage }: SettingsCardProps) {
  const engine = useConversionEngine();
  const settings = engine.getSettings();

  return (
    <section>
      <h2 className="section-title">Brick &amp; Landfill settings</h2>
      <div className="card settings-grid">
        {SETTING_FIELDS.map(({ name, label }) => (
          <label key={name} className="settings-field">
            <span className="settings-field__label">{label}</span>
            <NumericField
              key={`${name}:${settings[name]}`}
              value={settings[name]}
              ariaLabel={label}
              onCommit={v => {
                const result = engine.updateSetting(name, v);
                if (!result.ok) onMessage(`${label} must be greater than 0`);
                return result.ok;
              }}
              onInvalid={() => onMessage('Enter a valid number')}
            />
          </label>
        ))}
      </div>
    </section>
  );
}
