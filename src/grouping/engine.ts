import { GroupingError, toErrorMessage } from '../errors';
import type { FamilyStore } from '../store/types';
import type { TrajectoryChannel } from '../trajectory/types';
import { KeyedLock } from '../utils/keyed-lock';
import { createLogger } from '../utils/logger';
import {
  composeFamilyCode,
  MAX_FAMILY_SEQUENCE,
  normalizeCodeToken,
  parseFamilyCode,
} from './family-code';
import { personKey, UnionFind } from './graph';
import type {
  FamilyGroup,
  FamilyGroupingEngine,
  FamilyKey,
  GroupEdge,
  GroupingPerson,
  GroupingRelationship,
} from './types';

const logger = createLogger('grouping');

export interface FamilyGroupingEngineOptions {
  families: FamilyStore;
  /** Share one lock between engines that write to the same FamilyStore. */
  lock?: KeyedLock;
}

interface ResolvedCode {
  familyCode: string;
  sequence: number;
  codeSource: 'minted' | 'reused';
}

function clean(value: string | null | undefined): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

/** The explicit surname, else the last token of a multi-token name. */
export function effectiveSurname(person: GroupingPerson): string {
  const explicit = clean(person.surname);
  if (explicit) return explicit;
  const tokens = clean(person.displayName).split(' ');
  return tokens.length > 1 ? (tokens.at(-1) ?? '') : '';
}

export function familyKeyId(key: FamilyKey): string {
  return `${key.surname}|${key.location}`;
}

function populatedAttributes(person: GroupingPerson): number {
  return (effectiveSurname(person) ? 1 : 0) + (clean(person.location) ? 1 : 0);
}

/** Speaker first; otherwise the most filled-in member, earliest on ties. */
export function selectAnchor(members: readonly GroupingPerson[]): GroupingPerson | undefined {
  const speaker = members.find((member) => member.isSpeaker === true);
  if (speaker) return speaker;
  let best: GroupingPerson | undefined;
  for (const member of members) {
    if (!best || populatedAttributes(member) > populatedAttributes(best)) best = member;
  }
  return best;
}

export function createFamilyGroupingEngine(
  options: FamilyGroupingEngineOptions,
): FamilyGroupingEngine {
  const lock = options.lock ?? new KeyedLock();
  const { families } = options;

  async function resolveCode(key: FamilyKey, trajectory: TrajectoryChannel): Promise<ResolvedCode> {
    return lock.run(familyKeyId(key), async () => {
      const existing = await families.findExisting(key.surname, key.location);
      const parsed = existing ? parseFamilyCode(existing) : null;
      if (existing && parsed) {
        trajectory.act(`reuse family code ${existing}`, { familyKey: { ...key } });
        return { familyCode: existing, sequence: parsed.sequence, codeSource: 'reused' };
      }
      if (existing) {
        logger.log('ignoring malformed stored family code', { code: existing });
      }
      const sequence = await families.nextSequence(key.surname, key.location);
      if (!Number.isInteger(sequence) || sequence < 1 || sequence > MAX_FAMILY_SEQUENCE) {
        throw new Error(`family_sequence_exhausted:${key.surname}-${key.location}:${sequence}`);
      }
      const familyCode = composeFamilyCode(key.surname, key.location, sequence);
      trajectory.act(`mint family code ${familyCode}`, { familyKey: { ...key }, sequence });
      return { familyCode, sequence, codeSource: 'minted' };
    });
  }

  return {
    async group(persons, relationships, trajectory) {
      const index = new Map<string, number>();
      const nodes: GroupingPerson[] = [];
      for (const person of persons) {
        const key = personKey(person.displayName);
        if (!key || index.has(key)) continue;
        index.set(key, nodes.length);
        nodes.push(person);
      }
      trajectory.observe(`grouping ${nodes.length} person(s) with ${relationships.length} relationship(s)`, {
        persons: nodes.length,
        relationships: relationships.length,
      });

      const unknown = new Set<string>();
      for (const edge of relationships) {
        for (const name of [edge.personA, edge.personB]) {
          if (!index.has(personKey(name))) unknown.add(clean(name) || '(blank)');
        }
      }
      if (unknown.size > 0) {
        const error = new GroupingError([...unknown]);
        trajectory.error(error.message, { unknownNames: [...unknown] });
        throw error;
      }

      const forest = new UnionFind(nodes.length);
      const edgesByRoot = new Map<number, GroupEdge[]>();
      for (const edge of relationships) {
        forest.union(index.get(personKey(edge.personA)) ?? 0, index.get(personKey(edge.personB)) ?? 0);
      }
      for (const edge of relationships) {
        const a = index.get(personKey(edge.personA)) ?? 0;
        const b = index.get(personKey(edge.personB)) ?? 0;
        if (a === b) continue;
        const root = forest.find(a);
        const list = edgesByRoot.get(root) ?? [];
        const relationTerm = clean(edge.relationTerm);
        list.push({
          personA: nodes[a]?.displayName ?? edge.personA,
          personB: nodes[b]?.displayName ?? edge.personB,
          relationKind: edge.relationKind,
          ...(relationTerm ? { relationTerm } : {}),
        });
        edgesByRoot.set(root, list);
      }

      const runCodes = new Map<string, Promise<ResolvedCode>>();
      const groups: FamilyGroup[] = [];
      for (const component of forest.components()) {
        const members = component.flatMap((position) => nodes[position] ?? []);
        const groupId = `group-${groups.length + 1}`;
        const memberNames = members.map((member) => member.displayName);
        const edges = edgesByRoot.get(forest.find(component[0] ?? 0)) ?? [];
        const lone = members[0];

        if (members.length === 1 && lone && !effectiveSurname(lone)) {
          trajectory.result(`${lone.displayName} has no surname or relatives; left unassigned`, {
            groupId,
          });
          groups.push({
            groupId,
            status: 'unassigned',
            anchorName: null,
            memberNames,
            familyKey: null,
            familyCode: null,
            sequence: null,
            codeSource: null,
            edges,
          });
          continue;
        }

        const anchor = selectAnchor(members);
        if (!anchor) continue;
        const familyKey: FamilyKey = {
          surname: normalizeCodeToken(effectiveSurname(anchor)),
          location: normalizeCodeToken(anchor.location),
        };
        trajectory.reason(
          `${groupId}: anchor ${anchor.displayName}${anchor.isSpeaker ? ' (speaker)' : ''} seeds ${familyKey.surname}-${familyKey.location}`,
          { groupId, anchorName: anchor.displayName, memberNames, familyKey },
        );

        const keyId = familyKeyId(familyKey);
        let pending = runCodes.get(keyId);
        if (!pending) {
          pending = resolveCode(familyKey, trajectory);
          runCodes.set(keyId, pending);
        }

        try {
          const code = await pending;
          groups.push({
            groupId,
            status: 'assigned',
            anchorName: anchor.displayName,
            memberNames,
            familyKey,
            ...code,
            edges,
          });
          trajectory.result(`${groupId} -> ${code.familyCode} (${memberNames.length} member(s))`, {
            groupId,
            familyCode: code.familyCode,
            codeSource: code.codeSource,
          });
        } catch (error) {
          const message = toErrorMessage(error);
          logger.log('family code resolution failed', { groupId, familyKey, error });
          trajectory.error(`${groupId}: family code unavailable: ${message}`, { groupId, familyKey });
          groups.push({
            groupId,
            status: 'code_failed',
            anchorName: anchor.displayName,
            memberNames,
            familyKey,
            familyCode: null,
            sequence: null,
            codeSource: null,
            edges,
            error: message,
          });
        }
      }
      return groups;
    },
  };
}
