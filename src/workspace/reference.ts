export type ReferenceKind = 'term' | 'type' | 'data-constructor' | 'ability-constructor';

export type HashQualified =
  | { tag: 'name'; name: string }
  | { tag: 'hash'; hash: string }
  | { tag: 'qualified'; name: string; hash: string };

export interface Reference {
  kind: ReferenceKind;
  hq: HashQualified;
}

const REFERENCE_KINDS: ReferenceKind[] = ['term', 'type', 'data-constructor', 'ability-constructor'];

const URL_SEGMENTS: Record<ReferenceKind, string> = {
  term: 'terms',
  type: 'types',
  'data-constructor': 'constructors',
  'ability-constructor': 'abilities',
};

function isReferenceKind(value: string): value is ReferenceKind {
  return (REFERENCE_KINDS as string[]).includes(value);
}

function withHashPrefix(hash: string): string {
  return hash.startsWith('#') ? hash : `#${hash}`;
}

export function hqToString(hq: HashQualified): string {
  switch (hq.tag) {
    case 'name': return hq.name;
    case 'hash': return withHashPrefix(hq.hash);
    case 'qualified': return `${hq.name}${withHashPrefix(hq.hash)}`;
  }
}

/** Parses `name`, `#hash` or `name#hash`. Returns null for blank input. */
export function hqFromString(raw: string): HashQualified | null {
  const s = raw.trim();
  if (!s) return null;
  const hashAt = s.indexOf('#');
  if (hashAt === -1) return { tag: 'name', name: s };
  const hash = s.slice(hashAt);
  if (hash.length < 2) return null;
  if (hashAt === 0) return { tag: 'hash', hash };
  return { tag: 'qualified', name: s.slice(0, hashAt), hash };
}

/** The value sent as `names` to the codebase API. */
export function hqToApiName(hq: HashQualified): string {
  return hqToString(hq);
}

export function referenceToString(ref: Reference): string {
  return `${ref.kind}/${hqToString(ref.hq)}`;
}

export function referenceFromString(raw: string): Reference | null {
  const slash = raw.indexOf('/');
  if (slash === -1) return null;
  const kind = raw.slice(0, slash);
  if (!isReferenceKind(kind)) return null;
  const hq = hqFromString(raw.slice(slash + 1));
  return hq ? { kind, hq } : null;
}

export function referenceToUrlPath(ref: Reference): string {
  return `${URL_SEGMENTS[ref.kind]}/${encodeURIComponent(hqToString(ref.hq))}`;
}

export function referenceEquals(a: Reference, b: Reference): boolean {
  return a.kind === b.kind && hqToString(a.hq) === hqToString(b.hq);
}

export function termReference(raw: string): Reference | null {
  const hq = hqFromString(raw);
  return hq ? { kind: 'term', hq } : null;
}

export function typeReference(raw: string): Reference | null {
  const hq = hqFromString(raw);
  return hq ? { kind: 'type', hq } : null;
}
