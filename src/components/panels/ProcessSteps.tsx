import { PROCESS_STEPS } from '../../ui/ui.catalog';

export default function ProcessSteps() {
  return (
    <section>
      <h2 className="section-title">Process steps</h2>
      <ol className="process-steps">
        {PROCESS_STEPS.map(s => (
          <li key={s.step} className="process-step">
            <span className="process-step__badge">{s.step}</span>
            <span className="muted">{s.title} — {s.detail}</span>
          </li>
        ))}
      </ol>
    </section>
  );
}
