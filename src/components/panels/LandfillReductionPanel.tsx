import { useConversionEngine } from '../EngineProvider';
import { formatAreaM2, formatPercent, progressFraction } from '../../ui/format';
import InfoRow from './InfoRow';

export default function LandfillReductionPanel() {
  const engine = useConversionEngine();
  const pct = engine.percentLandfillReduced();

  return (
    <section>
      <h2 className="section-title">Landfill reduction</h2>
      <InfoRow title="Area reduced (m²)" value={formatAreaM2(engine.areaReduced())} />
      <div className="progress" role="progressbar" aria-valuemin={0} aria-valuemax={100} aria-valuenow={pct}>
        <div className="progress__fill" style={{ width: `${progressFraction(pct) * 100}%` }} />
      </div>
      <p className="muted">{formatPercent(pct)} of landfill area reduced</p>
    </section>
  );
}
