import type { Reference } from '../workspace/reference';

export type ZoomLevel = 'far' | 'medium' | 'near';

export interface DocSection {
  id: string;
  title: string;
  body: string;
}

/** A run of source text; `ref` is set when the run names another definition. */
export interface SyntaxSegment {
  text: string;
  ref: Reference | null;
}

export type TermCategory = 'plain' | 'test' | 'doc';
export type TypeCategory = 'data' | 'ability';

interface DefinitionBase {
  hash: string;
  name: string;
  otherNames: string[];
  source: SyntaxSegment[];
}

export interface TermItem extends DefinitionBase {
  kind: 'term';
  category: TermCategory;
  signature: SyntaxSegment[];
  doc: DocSection[] | null;
}

export interface TypeItem extends DefinitionBase {
  kind: 'type';
  category: TypeCategory;
  doc: DocSection[] | null;
}

export interface DataConstructorItem extends DefinitionBase {
  kind: 'data-constructor';
  signature: SyntaxSegment[];
}

export interface AbilityConstructorItem extends DefinitionBase {
  kind: 'ability-constructor';
  signature: SyntaxSegment[];
}

export type Item = TermItem | TypeItem | DataConstructorItem | AbilityConstructorItem;
