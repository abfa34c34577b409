import type { RelationKind } from '../extraction/types';
import type { TrajectoryChannel } from '../trajectory/types';

export interface GroupingPerson {
  displayName: string;
  surname?: string | null;
  location?: string | null;
  isSpeaker?: boolean;
}

export interface GroupingRelationship {
  personA: string;
  personB: string;
  relationKind: RelationKind;
  relationTerm?: string | null;
}

export interface FamilyKey {
  surname: string;
  location: string;
}

export type FamilyGroupStatus = 'assigned' | 'unassigned' | 'code_failed';

export interface GroupEdge {
  personA: string;
  personB: string;
  relationKind: RelationKind;
  relationTerm?: string;
}

export interface FamilyGroup {
  groupId: string;
  status: FamilyGroupStatus;
  /** Null only for the unassigned bucket. */
  anchorName: string | null;
  memberNames: string[];
  familyKey: FamilyKey | null;
  familyCode: string | null;
  sequence: number | null;
  codeSource: 'minted' | 'reused' | null;
  edges: GroupEdge[];
  error?: string;
}

export interface FamilyGroupingEngine {
  /** Throws GroupingError when an edge names someone outside `persons`. */
  group(
    persons: readonly GroupingPerson[],
    relationships: readonly GroupingRelationship[],
    trajectory: TrajectoryChannel,
  ): Promise<FamilyGroup[]>;
}
