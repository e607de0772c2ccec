import type { Character, Verdict } from '../types.js';

export type ClassifiableCharacter = Pick<Character, 'id' | 'name' | 'affiliations' | 'masters'>;

export type MasterResolver = (id: string) => ClassifiableCharacter | undefined;

export type AlignmentRule = 'name' | 'affiliation' | 'master' | 'none';

export interface AlignmentExplanation {
  verdict: Verdict;
  rule: AlignmentRule;
  detail: string;
}

export const DEFAULT_EVIL_AFFILIATIONS: readonly string[] = [
  'Sith',
  'Sith Order',
  'Galactic Empire',
  'First Order',
  'Separatist Alliance',
  'Confederacy of Independent Systems',
  'Death Watch',
  'Nightsisters',
  'Inquisitorius',
  'Black Sun',
  'Crimson Dawn',
];

const EVIL_NAME_MARKERS = ['darth', 'sith'];

export interface AlignmentOptions {
  evilAffiliations?: readonly string[];
}

function evilNameMarker(name: string): string | undefined {
  const lc = name.toLowerCase();
  return EVIL_NAME_MARKERS.find((m) => lc.includes(m));
}

function evilAffiliation(affiliations: readonly string[], known: readonly string[]): string | undefined {
  const knownLc = known.map((k) => k.toLowerCase());
  return affiliations.find((a) => {
    const lc = a.trim().toLowerCase();
    return lc.length > 0 && knownLc.some((k) => lc === k || lc.includes(k));
  });
}

// Rules 1 and 2 only: what a character is on its own, ignoring its masters.
function intrinsicEvil(c: ClassifiableCharacter, known: readonly string[]): { rule: 'name' | 'affiliation'; detail: string } | undefined {
  const marker = evilNameMarker(c.name);
  if (marker) return { rule: 'name', detail: `name "${c.name}" contains "${marker}"` };
  const affiliation = evilAffiliation(c.affiliations, known);
  if (affiliation) return { rule: 'affiliation', detail: `affiliated with ${affiliation}` };
  return undefined;
}

/**
 * Walks the master graph breadth-first from `root`. An evil master anywhere
 * up the chain taints the root. Ids already visited are skipped, so a cycle
 * contributes nothing and the walk always ends.
 */
function findEvilMaster(root: ClassifiableCharacter, resolve: MasterResolver, known: readonly string[]): { master: ClassifiableCharacter; reason: string } | undefined {
  const visited = new Set<string>([root.id]);
  const queue: string[] = [...root.masters];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);

    const master = resolve(id);
    if (!master) continue;

    const hit = intrinsicEvil(master, known);
    if (hit) return { master, reason: hit.detail };

    for (const next of master.masters) {
      if (!visited.has(next)) queue.push(next);
    }
  }
  return undefined;
}

export function explain(character: ClassifiableCharacter, resolveMaster: MasterResolver, opts: AlignmentOptions = {}): AlignmentExplanation {
  const known = opts.evilAffiliations ?? DEFAULT_EVIL_AFFILIATIONS;

  const own = intrinsicEvil(character, known);
  if (own) return { verdict: 'evil', ...own };

  const tainted = findEvilMaster(character, resolveMaster, known);
  if (tainted) {
    return { verdict: 'evil', rule: 'master', detail: `trained by ${tainted.master.name} (${tainted.reason})` };
  }

  return { verdict: 'good', rule: 'none', detail: 'no evil name, affiliation or master' };
}

export function classify(character: ClassifiableCharacter, resolveMaster: MasterResolver, opts: AlignmentOptions = {}): Verdict {
  return explain(character, resolveMaster, opts).verdict;
}
