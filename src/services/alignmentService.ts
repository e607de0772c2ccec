import { explain, type AlignmentExplanation } from '../lib/alignment.js';
import { CoreError } from '../lib/errors.js';
import type { Repo } from '../db/repo.js';
import type { Character } from '../types.js';

export interface CharacterAlignment extends AlignmentExplanation {
  characterId: string;
}

export interface AlignmentService {
  verdictFor(character: Character): Promise<AlignmentExplanation>;
  classifyCharacter(characterId: string): Promise<CharacterAlignment>;
}

/**
 * Verdicts are computed on every read from the stored name, affiliations and
 * master chain; nothing is cached, so a verdict can never lag its inputs.
 */
export function createAlignmentService(deps: { repo: Repo; evilAffiliations?: readonly string[] }): AlignmentService {
  const { repo } = deps;

  // Fetch every character reachable through master references, one batch per
  // hop. Ids are only requested once, so cyclic chains terminate.
  async function loadMasterGraph(root: Character): Promise<Map<string, Character>> {
    const known = new Map<string, Character>([[root.id, root]]);
    const requested = new Set<string>([root.id]);
    let frontier = root.masters.filter((id) => !requested.has(id));

    while (frontier.length > 0) {
      frontier.forEach((id) => requested.add(id));
      const found = await repo.getCharacters(frontier);
      const next: string[] = [];
      for (const c of found) {
        known.set(c.id, c);
        for (const m of c.masters) {
          if (!requested.has(m) && !next.includes(m)) next.push(m);
        }
      }
      frontier = next;
    }
    return known;
  }

  async function verdictFor(character: Character): Promise<AlignmentExplanation> {
    const graph = await loadMasterGraph(character);
    return explain(character, (id) => graph.get(id), { evilAffiliations: deps.evilAffiliations });
  }

  return {
    verdictFor,

    async classifyCharacter(characterId: string): Promise<CharacterAlignment> {
      const character = await repo.getCharacter(characterId);
      if (!character) throw new CoreError('character_not_found', `Character ${characterId} not found`);
      return { characterId, ...(await verdictFor(character)) };
    },
  };
}
