import type { ReactNode } from 'react';

interface CodeBlockProps {
  children: ReactNode;
  maxHeight?: string;
}

export function CodeBlock({ children, maxHeight = 'max-h-96' }: CodeBlockProps) {
  return (
    <pre className={`text-xs font-mono bg-gray-900 text-gray-100 p-3 rounded overflow-auto whitespace-pre ${maxHeight}`}>
      {children}
    </pre>
  );
}
