import { NotFoundError } from '../errors';
import {
  applyPersonUpdate,
  familyLookupKey,
  relationshipKey,
  scoreCandidates,
  type StoreSearchOptions,
} from './records';
import type {
  CandidateMatch,
  FamilyRecord,
  FamilyStore,
  NewPersonRecord,
  PersonAttributes,
  PersonRecord,
  PersonSearchOptions,
  PersonStore,
  PersonUpdate,
  RelationshipRecord,
  RelationshipStore,
} from './types';

export interface MemoryStoreOptions extends StoreSearchOptions {
  clock?: () => Date;
}

export class MemoryPersonStore implements PersonStore {
  private readonly records = new Map<string, PersonRecord>();
  private readonly searchOptions: StoreSearchOptions;
  private readonly clock: () => Date;
  private counter = 0;

  constructor(options: MemoryStoreOptions = {}) {
    const { clock, ...searchOptions } = options;
    this.searchOptions = searchOptions;
    this.clock = clock ?? (() => new Date());
  }

  async search(
    query: string,
    attributes?: PersonAttributes,
    options?: PersonSearchOptions,
  ): Promise<CandidateMatch[]> {
    return scoreCandidates(this.records.values(), query, attributes, this.searchOptions, options);
  }

  async create(record: NewPersonRecord): Promise<string> {
    this.counter += 1;
    const personId = `person-${this.counter}`;
    const now = this.clock().toISOString();
    this.records.set(personId, {
      ...record,
      mentions: [...record.mentions],
      personId,
      createdAt: now,
      updatedAt: now,
    });
    return personId;
  }

  async update(personId: string, fields: PersonUpdate): Promise<void> {
    const current = this.records.get(personId);
    if (!current) throw new NotFoundError(personId);
    this.records.set(personId, applyPersonUpdate(current, fields, this.clock().toISOString()));
  }

  get(personId: string): PersonRecord | undefined {
    return this.records.get(personId);
  }

  list(): PersonRecord[] {
    return [...this.records.values()];
  }
}

export class MemoryFamilyStore implements FamilyStore {
  private readonly families = new Map<string, FamilyRecord>();
  private readonly sequences = new Map<string, number>();

  async nextSequence(surname: string, location: string): Promise<number> {
    const key = familyLookupKey(surname, location);
    const next = (this.sequences.get(key) ?? 0) + 1;
    this.sequences.set(key, next);
    return next;
  }

  async findExisting(surname: string, location: string): Promise<string | null> {
    const key = familyLookupKey(surname, location);
    for (const family of this.families.values()) {
      if (familyLookupKey(family.surname, family.location) === key) return family.familyCode;
    }
    return null;
  }

  async upsert(family: FamilyRecord): Promise<void> {
    this.families.set(family.familyCode, { ...family });
    const key = familyLookupKey(family.surname, family.location);
    this.sequences.set(key, Math.max(this.sequences.get(key) ?? 0, family.sequence));
  }

  get(familyCode: string): FamilyRecord | undefined {
    return this.families.get(familyCode);
  }

  list(): FamilyRecord[] {
    return [...this.families.values()];
  }
}

export class MemoryRelationshipStore implements RelationshipStore {
  private readonly edges = new Map<string, RelationshipRecord>();

  async link(edge: RelationshipRecord): Promise<void> {
    const key = relationshipKey(edge);
    if (!this.edges.has(key)) this.edges.set(key, { ...edge });
  }

  list(): RelationshipRecord[] {
    return [...this.edges.values()];
  }
}

export interface MemoryStores {
  persons: MemoryPersonStore;
  families: MemoryFamilyStore;
  relationships: MemoryRelationshipStore;
}

export function createMemoryStores(options: MemoryStoreOptions = {}): MemoryStores {
  return {
    persons: new MemoryPersonStore(options),
    families: new MemoryFamilyStore(),
    relationships: new MemoryRelationshipStore(),
  };
}
