import type {
  TrajectoryChannel,
  TrajectoryMetadata,
  TrajectoryStep,
  TrajectoryStepType,
} from './types';

export interface TrajectoryRecorderOptions {
  clock?: () => Date;
  maxContentChars?: number;
}

export interface TrajectoryFilter {
  agentName?: string;
  stepType?: TrajectoryStepType;
}

const DEFAULT_MAX_CONTENT_CHARS = 2000;

function clip(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, Math.max(0, max - 3))}...`;
}

/**
 * Append-only, session-scoped log. One instance per pipeline run; components
 * get a channel through `forAgent` instead of reaching for shared state.
 */
export class TrajectoryRecorder {
  readonly sessionId: string;
  private readonly steps: TrajectoryStep[] = [];
  private readonly agentCounters = new Map<string, number>();
  private readonly clock: () => Date;
  private readonly maxContentChars: number;
  private sealed = false;

  constructor(sessionId: string, options: TrajectoryRecorderOptions = {}) {
    const trimmed = sessionId.trim();
    if (!trimmed) throw new Error('invalid_session_id');
    this.sessionId = trimmed;
    this.clock = options.clock ?? (() => new Date());
    this.maxContentChars = Math.max(
      80,
      Math.floor(options.maxContentChars ?? DEFAULT_MAX_CONTENT_CHARS),
    );
  }

  record(
    agentName: string,
    stepType: TrajectoryStepType,
    content: string,
    metadata: TrajectoryMetadata = {},
  ): TrajectoryStep {
    if (this.sealed) throw new Error(`trajectory_sealed:${this.sessionId}`);
    const agentSequence = (this.agentCounters.get(agentName) ?? 0) + 1;
    this.agentCounters.set(agentName, agentSequence);
    const step: TrajectoryStep = Object.freeze({
      sessionId: this.sessionId,
      agentName,
      stepType,
      content: clip(content, this.maxContentChars),
      metadata: Object.freeze({ ...metadata }),
      timestamp: this.clock().toISOString(),
      sequence: this.steps.length + 1,
      agentSequence,
    });
    this.steps.push(step);
    return step;
  }

  forAgent(agentName: string): TrajectoryChannel {
    const name = agentName.trim() || 'unknown';
    return {
      agentName: name,
      observe: (content, metadata) => this.record(name, 'observation', content, metadata),
      reason: (content, metadata) => this.record(name, 'reasoning', content, metadata),
      act: (content, metadata) => this.record(name, 'action', content, metadata),
      result: (content, metadata) => this.record(name, 'result', content, metadata),
      error: (content, metadata) => this.record(name, 'error', content, metadata),
    };
  }

  list(filter: TrajectoryFilter = {}): TrajectoryStep[] {
    return this.steps.filter(
      (step) =>
        (filter.agentName === undefined || step.agentName === filter.agentName) &&
        (filter.stepType === undefined || step.stepType === filter.stepType),
    );
  }

  get size(): number {
    return this.steps.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /** Closes the log; later writes throw. Returns the final step list. */
  seal(): TrajectoryStep[] {
    this.sealed = true;
    return [...this.steps];
  }
}

export function formatTrajectory(steps: readonly TrajectoryStep[]): string {
  return steps
    .map(
      (step) =>
        `#${step.sequence} [${step.agentName}#${step.agentSequence}] ${step.stepType}: ${step.content}`,
    )
    .join('\n');
}
