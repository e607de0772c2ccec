export type Verdict = 'good' | 'evil';

export interface Character {
  id: string;
  name: string;
  affiliations: string[];
  /** Weak references to other characters by id; may dangle. */
  masters: string[];
  biography?: string;
  height?: number;
  mass?: number;
  gender?: string;
  homeworld?: string;
  species?: string;
  imageUrl?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type CharacterInput = Omit<Character, 'createdAt' | 'updatedAt'>;

export interface Team {
  id: string;
  name: string;
  ownerId?: string;
  /** Ordered member character ids. */
  members: string[];
  /** Bumped on every membership change; used for compare-and-set writes. */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SearchIndexEntry {
  characterId: string;
  vector: number[];
  textHash: string;
  model: string;
  updatedAt: Date;
}

export interface SearchHit {
  characterId: string;
  score: number;
}
