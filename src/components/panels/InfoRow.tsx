export default function InfoRow({ title, value }: { title: string; value: string }) {
  return (
    <div className="info-row">
      <span className="info-row__title">{title}</span>
      <span className="info-row__value">{value}</span>
    </div>
  );
}
