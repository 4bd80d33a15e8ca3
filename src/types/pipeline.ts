/**
 * Pipeline, stage and result definitions.
 * A run threads one request through the five reasoning stages in a fixed order.
 */

export enum StageStatus {
  Pending = "pending",
  Running = "running",
  Completed = "completed",
  Skipped = "skipped",
  Failed = "failed",
}

export enum StageType {
  Preprocessing = "preprocessing",
  WorkingAwareness = "working_awareness",
  Compaction = "compaction",
  Reranking = "reranking",
  FinalResponse = "final_response",
}

/** Definition order of the stages. Configuration never reorders it. */
export const STAGE_ORDER: readonly StageType[] = [
  StageType.Preprocessing,
  StageType.WorkingAwareness,
  StageType.Compaction,
  StageType.Reranking,
  StageType.FinalResponse,
];

export interface PipelineRequest {
  readonly prompt: string;
  readonly context?: string;
  readonly constraints: readonly string[];
  /** Caller-owned tags. Carried through to the result, never read by stages. */
  readonly metadata?: Readonly<Record<string, string>>;
}

// ---------------------------------------------------------------------------
// Stage outputs
// ---------------------------------------------------------------------------

export interface TextOutput {
  readonly text: string;
}

export interface PerspectiveOutput {
  readonly index: number;
  readonly framing: string;
  readonly status: StageStatus.Completed | StageStatus.Failed;
  readonly text?: string;
  readonly error?: string;
}

export interface WorkingAwarenessOutput {
  readonly perspectives: readonly PerspectiveOutput[];
}

export interface CompactionOutput {
  readonly text: string;
  /** False when the sources passed through without a compactor call. */
  readonly compacted: boolean;
  readonly sourceCount: number;
}

export interface RankedCandidate {
  readonly document: string;
  readonly score: number;
}

export interface RerankingOutput {
  readonly top: string;
  readonly ranked: readonly RankedCandidate[];
}

export interface StageOutputMap {
  [StageType.Preprocessing]: TextOutput;
  [StageType.WorkingAwareness]: WorkingAwarenessOutput;
  [StageType.Compaction]: CompactionOutput;
  [StageType.Reranking]: RerankingOutput;
  [StageType.FinalResponse]: TextOutput;
}

/** Outputs published by completed stages, one entry per stage type. */
export type SharedData = { [K in StageType]?: StageOutputMap[K] };

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type StageErrorKind = "collaborator" | "cancellation" | "unexpected";

export type SkipReason = "disabled" | "aborted";

export interface StageResult<K extends StageType = StageType> {
  readonly stageType: K;
  readonly status: StageStatus;
  /** Present iff status is completed. */
  readonly output?: StageOutputMap[K];
  readonly durationMs: number;
  /** Present iff status is failed. */
  readonly error?: string;
  readonly errorKind?: StageErrorKind;
  readonly skipReason?: SkipReason;
  readonly cacheHit?: boolean;
}

export type FinalResponseSource = StageType | "request";

export interface PipelineResultMetadata {
  readonly metrics?: Readonly<Record<string, number>>;
  readonly traceId?: string;
  readonly spans?: readonly SpanRecord[];
  readonly cacheHits: number;
  readonly finalResponseSource: FinalResponseSource;
}

export interface SpanRecord {
  readonly spanId: string;
  readonly traceId: string;
  readonly parentId: string | null;
  readonly name: string;
  readonly startTime: number;
  readonly endTime: number | null;
  readonly durationMs: number | null;
  readonly attributes: Readonly<Record<string, string>>;
}

export interface PipelineResult {
  readonly finalResponse: string;
  /** One entry per stage, in definition order. */
  readonly stages: readonly StageResult[];
  readonly totalDurationMs: number;
  readonly request: PipelineRequest;
  readonly metadata: PipelineResultMetadata;
}
