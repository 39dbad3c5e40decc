import type { Item } from '../types/definition';

export function itemKindLabel(item: Item): string {
  switch (item.kind) {
    case 'term':
      if (item.category === 'test') return 'test';
      if (item.category === 'doc') return 'doc';
      return 'term';
    case 'type': return item.category === 'ability' ? 'ability' : 'type';
    case 'data-constructor': return 'constructor';
    case 'ability-constructor': return 'ability constructor';
  }
}

export function kindBadgeClass(label: string): string {
  switch (label) {
    case 'term': return 'bg-blue-100 text-blue-800 dark:bg-blue-900 dark:text-blue-200';
    case 'test': return 'bg-green-100 text-green-800 dark:bg-green-900 dark:text-green-200';
    case 'doc': return 'bg-amber-100 text-amber-800 dark:bg-amber-900 dark:text-amber-200';
    case 'type': return 'bg-purple-100 text-purple-800 dark:bg-purple-900 dark:text-purple-200';
    case 'ability': return 'bg-teal-100 text-teal-800 dark:bg-teal-900 dark:text-teal-200';
    case 'constructor':
    case 'ability constructor':
      return 'bg-orange-100 text-orange-800 dark:bg-orange-900 dark:text-orange-200';
    default: return 'bg-gray-100 text-gray-600 dark:bg-gray-700 dark:text-gray-300';
  }
}
