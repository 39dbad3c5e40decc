import type { DocSection, Item, SyntaxSegment, TermCategory, TypeCategory } from '../types/definition';
import { hqToApiName, referenceToString, type Reference, type ReferenceKind } from '../workspace/reference';
import { api, DecodeError } from './client';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function asStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

const ANNOTATION_KINDS = new Map<string, ReferenceKind>([
  ['TermReference', 'term'],
  ['TypeReference', 'type'],
  ['DataConstructorReference', 'data-constructor'],
  ['AbilityConstructorReference', 'ability-constructor'],
]);

function annotationRef(annotation: unknown): Reference | null {
  if (!isRecord(annotation) || typeof annotation.tag !== 'string') return null;
  const kind = ANNOTATION_KINDS.get(annotation.tag);
  const hash = annotation.contents;
  if (!kind || typeof hash !== 'string' || hash === '') return null;
  return { kind, hq: { tag: 'hash', hash } };
}

/**
 * Source and signatures arrive as syntax segments (`[{ segment, annotation }]`),
 * sometimes wrapped in `{ tag, contents }`. Annotations naming a definition
 * become the segment's `ref`.
 */
export function syntaxToSegments(value: unknown): SyntaxSegment[] {
  if (typeof value === 'string') return value ? [{ text: value, ref: null }] : [];
  if (Array.isArray(value)) return value.flatMap((v: unknown) => syntaxToSegments(v));
  if (isRecord(value)) {
    if (typeof value.segment === 'string') {
      return [{ text: value.segment, ref: annotationRef(value.annotation) }];
    }
    if ('contents' in value) return syntaxToSegments(value.contents);
  }
  return [];
}

export function segmentsToText(segments: SyntaxSegment[]): string {
  return segments.map((seg) => seg.text).join('');
}

export function syntaxToText(value: unknown): string {
  return segmentsToText(syntaxToSegments(value));
}

// Docs arrive as `[name, hash, doc]` tuples.
function decodeDocs(value: unknown): DocSection[] | null {
  if (!Array.isArray(value)) return null;
  const sections = value.flatMap((entry: unknown, i: number): DocSection[] => {
    if (!Array.isArray(entry)) return [];
    const name = asString(entry[0]);
    const hash = asString(entry[1]);
    const body: unknown = entry[2];
    return [{ id: name || hash || `doc-${i}`, title: name, body: syntaxToText(body) }];
  });
  return sections.length > 0 ? sections : null;
}

function termCategory(tag: unknown): TermCategory {
  if (tag === 'Test') return 'test';
  if (tag === 'Doc') return 'doc';
  return 'plain';
}

function typeCategory(tag: unknown): TypeCategory {
  return tag === 'Ability' ? 'ability' : 'data';
}

function firstDefinition(defs: unknown, ref: Reference): [string, Record<string, unknown>] {
  const entry = isRecord(defs) ? Object.entries(defs).find(([, v]) => isRecord(v)) : undefined;
  if (!entry || !isRecord(entry[1])) {
    throw new DecodeError(`No definition found for ${referenceToString(ref)}`);
  }
  return [entry[0], entry[1]];
}

function decodeBase(hash: string, bestName: unknown, names: unknown, source: unknown) {
  const otherNames = asStringList(names);
  const name = asString(bestName) || otherNames[0] || hash;
  return { hash, name, otherNames: otherNames.filter((n) => n !== name), source: syntaxToSegments(source) };
}

export function decodeDefinition(ref: Reference, body: unknown): Item {
  if (!isRecord(body)) throw new DecodeError('Expected a definitions object');

  if (ref.kind === 'type') {
    const [hash, defn] = firstDefinition(body.typeDefinitions, ref);
    return {
      kind: 'type',
      ...decodeBase(hash, defn.bestTypeName, defn.typeNames, defn.typeDefinition),
      category: typeCategory(defn.defnTypeTag),
      doc: decodeDocs(defn.typeDocs),
    };
  }

  const [hash, defn] = firstDefinition(body.termDefinitions, ref);
  const base = decodeBase(hash, defn.bestTermName, defn.termNames, defn.termDefinition);
  const signature = syntaxToSegments(defn.signature);

  switch (ref.kind) {
    case 'term':
      return { kind: 'term', ...base, category: termCategory(defn.defnTermTag), signature, doc: decodeDocs(defn.termDocs) };
    case 'data-constructor':
      return { kind: 'data-constructor', ...base, signature };
    case 'ability-constructor':
      return { kind: 'ability-constructor', ...base, signature };
  }
}

export async function getDefinition(ref: Reference): Promise<Item> {
  const body = await api.get('/getDefinition', {
    names: hqToApiName(ref.hq),
    suffixifyBindings: true,
  });
  return decodeDefinition(ref, body);
}
