export const TRAJECTORY_STEP_TYPES = [
  'observation',
  'reasoning',
  'action',
  'result',
  'error',
] as const;

export type TrajectoryStepType = (typeof TRAJECTORY_STEP_TYPES)[number];

export type TrajectoryMetadata = Record<string, unknown>;

export interface TrajectoryStep {
  sessionId: string;
  agentName: string;
  stepType: TrajectoryStepType;
  content: string;
  metadata: TrajectoryMetadata;
  timestamp: string;
  /** Recorder-wide creation order; reconstructs a total order across agents. */
  sequence: number;
  /** Emission order within one agent. */
  agentSequence: number;
}

/** Write handle for one agent; every component receives one of these per call. */
export interface TrajectoryChannel {
  readonly agentName: string;
  observe(content: string, metadata?: TrajectoryMetadata): TrajectoryStep;
  reason(content: string, metadata?: TrajectoryMetadata): TrajectoryStep;
  act(content: string, metadata?: TrajectoryMetadata): TrajectoryStep;
  result(content: string, metadata?: TrajectoryMetadata): TrajectoryStep;
  error(content: string, metadata?: TrajectoryMetadata): TrajectoryStep;
}

/** Destination for a finished run's steps. */
export interface TrajectorySink {
  archive(sessionId: string, steps: readonly TrajectoryStep[]): void | Promise<void>;
}
