import type { SyntaxSegment } from '../../types/definition';
import { referenceToString, type Reference } from '../../workspace/reference';

interface SyntaxViewProps {
  segments: SyntaxSegment[];
  onOpen: (ref: Reference) => void;
}

export function SyntaxView({ segments, onOpen }: SyntaxViewProps) {
  return (
    <>
      {segments.map((seg, i) => {
        const target = seg.ref;
        if (!target) return <span key={i}>{seg.text}</span>;
        return (
          <button
            key={i}
            type="button"
            title={referenceToString(target)}
            onClick={(e) => { e.stopPropagation(); onOpen(target); }}
            className="font-mono text-sky-300 hover:underline"
          >
            {seg.text}
          </button>
        );
      })}
    </>
  );
}
