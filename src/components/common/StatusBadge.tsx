import { kindBadgeClass } from '../../utils/colors';

export function StatusBadge({ label }: { label: string }) {
  return (
    <span className={`inline-block px-2 py-0.5 rounded-full text-xs font-medium ${kindBadgeClass(label)}`}>
      {label || 'unknown'}
    </span>
  );
}
