import type { SearchConfig } from '../config/schema';
import type { RelationKind } from '../extraction/types';
import type { SimilarityOptions } from '../matching/similarity';

export interface CandidateMatch {
  personId: string;
  score: number;
  /** The stored name the query matched against. */
  matchedOn: string;
}

export interface PersonAttributes {
  surname?: string | null;
  location?: string | null;
  age?: number | null;
  occupation?: string | null;
  gender?: string | null;
}

export interface PersonRecord extends PersonAttributes {
  personId: string;
  displayName: string;
  familyCode: string | null;
  mentions: string[];
  createdAt: string;
  updatedAt: string;
}

export type NewPersonRecord = Omit<PersonRecord, 'personId' | 'createdAt' | 'updatedAt'>;

export interface PersonUpdate extends PersonAttributes {
  familyCode?: string | null;
  /** Appended to the stored mentions, never replacing them. */
  mentions?: string[];
}

/**
 * Per-call scoring settings. The pipeline passes its `similarity` and `search`
 * config sections here; a store may ignore them if it scores some other way.
 */
export interface PersonSearchOptions extends Partial<SearchConfig> {
  similarity?: SimilarityOptions;
}

export interface PersonStore {
  search(
    query: string,
    attributes?: PersonAttributes,
    options?: PersonSearchOptions,
  ): Promise<CandidateMatch[]>;
  create(record: NewPersonRecord): Promise<string>;
  update(personId: string, fields: PersonUpdate): Promise<void>;
}

export interface FamilyRecord {
  familyCode: string;
  surname: string;
  location: string;
  sequence: number;
  anchorName: string;
  memberCount: number;
}

export interface FamilyStore {
  nextSequence(surname: string, location: string): Promise<number>;
  findExisting(surname: string, location: string): Promise<string | null>;
  upsert(family: FamilyRecord): Promise<void>;
}

export interface RelationshipRecord {
  personAId: string;
  personBId: string;
  relationKind: RelationKind;
  relationTerm?: string;
}

export interface RelationshipStore {
  link(edge: RelationshipRecord): Promise<void>;
}
