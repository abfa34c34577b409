import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { getStoreDir } from '../config/paths';
import { NotFoundError, StoreUnavailableError, toErrorMessage } from '../errors';
import { RelationKindSchema } from '../extraction/types';
import { createLogger } from '../utils/logger';
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

const logger = createLogger('store');

const PersonRecordSchema = z.object({
  personId: z.string(),
  displayName: z.string(),
  familyCode: z.string().nullable(),
  mentions: z.array(z.string()),
  createdAt: z.string(),
  updatedAt: z.string(),
  surname: z.string().nullish(),
  location: z.string().nullish(),
  age: z.number().nullish(),
  occupation: z.string().nullish(),
  gender: z.string().nullish(),
});

const PersonFileSchema = z.object({
  counter: z.number().int().min(0),
  records: z.array(PersonRecordSchema),
});

const FamilyRecordSchema = z.object({
  familyCode: z.string(),
  surname: z.string(),
  location: z.string(),
  sequence: z.number().int(),
  anchorName: z.string(),
  memberCount: z.number().int(),
});

const FamilyFileSchema = z.object({
  sequences: z.record(z.number().int()),
  families: z.array(FamilyRecordSchema),
});

const RelationshipFileSchema = z.object({
  edges: z.array(
    z.object({
      personAId: z.string(),
      personBId: z.string(),
      relationKind: RelationKindSchema,
      relationTerm: z.string().optional(),
    }),
  ),
});

function readStoreFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, empty: T): T {
  if (!fs.existsSync(file)) return empty;
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8')) as unknown;
  } catch (error) {
    logger.log('unreadable store file', { file, error });
    throw new StoreUnavailableError(`cannot read ${path.basename(file)}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.log('store file failed validation', { file, issues: parsed.error.issues.length });
    throw new StoreUnavailableError(`corrupt store file ${path.basename(file)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function writeStoreFile(file: string, payload: unknown): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const tmp = `${file}.tmp.${process.pid}.${Date.now()}`;
    fs.writeFileSync(tmp, `${JSON.stringify(payload, null, 2)}\n`, 'utf-8');
    fs.renameSync(tmp, file);
  } catch (error) {
    logger.log('write failed', { file, error });
    throw new StoreUnavailableError(`cannot write ${path.basename(file)}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
}

export interface FileStoreOptions extends StoreSearchOptions {
  clock?: () => Date;
}

/**
 * JSON-file stores under `<projectDir>/.family-intake/store/`. Every call is a
 * synchronous read-modify-write, so sequence allocation cannot interleave
 * within one process.
 */
export class FilePersonStore implements PersonStore {
  private readonly file: string;
  private readonly searchOptions: StoreSearchOptions;
  private readonly clock: () => Date;

  constructor(projectDir: string, options: FileStoreOptions = {}) {
    this.file = path.join(getStoreDir(projectDir), 'persons.json');
    const { clock, ...searchOptions } = options;
    this.searchOptions = searchOptions;
    this.clock = clock ?? (() => new Date());
  }

  private read(): z.infer<typeof PersonFileSchema> {
    return readStoreFile(this.file, PersonFileSchema, { counter: 0, records: [] });
  }

  async search(
    query: string,
    attributes?: PersonAttributes,
    options?: PersonSearchOptions,
  ): Promise<CandidateMatch[]> {
    return scoreCandidates(this.read().records, query, attributes, this.searchOptions, options);
  }

  async create(record: NewPersonRecord): Promise<string> {
    const state = this.read();
    const counter = state.counter + 1;
    const personId = `person-${counter}`;
    const now = this.clock().toISOString();
    state.records.push({
      ...record,
      mentions: [...record.mentions],
      personId,
      createdAt: now,
      updatedAt: now,
    });
    writeStoreFile(this.file, { counter, records: state.records });
    return personId;
  }

  async update(personId: string, fields: PersonUpdate): Promise<void> {
    const state = this.read();
    const index = state.records.findIndex((record) => record.personId === personId);
    const current = state.records[index];
    if (index < 0 || !current) throw new NotFoundError(personId);
    state.records[index] = applyPersonUpdate(current, fields, this.clock().toISOString());
    writeStoreFile(this.file, state);
  }

  list(): PersonRecord[] {
    return this.read().records;
  }
}

export class FileFamilyStore implements FamilyStore {
  private readonly file: string;

  constructor(projectDir: string) {
    this.file = path.join(getStoreDir(projectDir), 'families.json');
  }

  private read(): z.infer<typeof FamilyFileSchema> {
    return readStoreFile(this.file, FamilyFileSchema, { sequences: {}, families: [] });
  }

  async nextSequence(surname: string, location: string): Promise<number> {
    const state = this.read();
    const key = familyLookupKey(surname, location);
    const next = (state.sequences[key] ?? 0) + 1;
    state.sequences[key] = next;
    writeStoreFile(this.file, state);
    return next;
  }

  async findExisting(surname: string, location: string): Promise<string | null> {
    const key = familyLookupKey(surname, location);
    const match = this.read().families.find(
      (family) => familyLookupKey(family.surname, family.location) === key,
    );
    return match?.familyCode ?? null;
  }

  async upsert(family: FamilyRecord): Promise<void> {
    const state = this.read();
    const key = familyLookupKey(family.surname, family.location);
    state.families = [
      ...state.families.filter((existing) => existing.familyCode !== family.familyCode),
      { ...family },
    ];
    state.sequences[key] = Math.max(state.sequences[key] ?? 0, family.sequence);
    writeStoreFile(this.file, state);
  }

  list(): FamilyRecord[] {
    return this.read().families;
  }
}

export class FileRelationshipStore implements RelationshipStore {
  private readonly file: string;

  constructor(projectDir: string) {
    this.file = path.join(getStoreDir(projectDir), 'relationships.json');
  }

  private read(): z.infer<typeof RelationshipFileSchema> {
    return readStoreFile(this.file, RelationshipFileSchema, { edges: [] });
  }

  async link(edge: RelationshipRecord): Promise<void> {
    const state = this.read();
    const key = relationshipKey(edge);
    if (state.edges.some((existing) => relationshipKey(existing) === key)) return;
    state.edges.push({ ...edge });
    writeStoreFile(this.file, state);
  }

  list(): RelationshipRecord[] {
    return this.read().edges;
  }
}

export function createFileStores(projectDir: string, options: FileStoreOptions = {}) {
  return {
    persons: new FilePersonStore(projectDir, options),
    families: new FileFamilyStore(projectDir),
    relationships: new FileRelationshipStore(projectDir),
  };
}
