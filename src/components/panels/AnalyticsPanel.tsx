import { useConversionEngine } from '../EngineProvider';
import { formatKg, formatVolumeM3 } from '../../ui/format';
import InfoRow from './InfoRow';

export default function AnalyticsPanel() {
  const engine = useConversionEngine();
  const metrics = engine.metrics();

  return (
    <section>
      <h2 className="section-title">Realtime Analytics</h2>
      <InfoRow title="Total available waste (kg)" value={formatKg(metrics.totalAvailableWasteKg)} />
      <InfoRow title="Bricks producible (count)" value={String(metrics.bricksProducible)} />
      <InfoRow title="Volume diverted (m³)" value={formatVolumeM3(metrics.volumeDivertedM3)} />
    </section>
  );
}
