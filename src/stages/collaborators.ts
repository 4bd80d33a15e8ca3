/**
 * Collaborator calls made by the stages.
 *
 * Each call receives the stage's signal. A cancellation passes through
 * unchanged; every other rejection is wrapped in a CollaboratorError.
 */

import { z } from "zod";

import { CancellationError, CollaboratorError, errorMessage } from "../errors/index.js";
import type {
  AgentCallOptions,
  Compactor,
  ReasoningAgent,
  Reranker,
} from "../types/collaborators.js";
import type { RankedCandidate } from "../types/pipeline.js";
import { abortReason } from "../pipeline/cancellation.js";

export const RankedCandidateSchema = z.object({
  document: z.string(),
  score: z.number().finite(),
});

export const RankedCandidatesSchema = z.array(RankedCandidateSchema);

function rethrow(
  collaborator: CollaboratorError["collaborator"],
  label: string,
  err: unknown,
  signal: AbortSignal
): never {
  if (err instanceof CancellationError) throw err;
  if (signal.aborted) throw abortReason(signal);
  throw new CollaboratorError(collaborator, `${label} failed: ${errorMessage(err)}`, { cause: err });
}

export async function callAgent(
  agent: ReasoningAgent,
  prompt: string,
  context: string | undefined,
  options: AgentCallOptions & { signal: AbortSignal }
): Promise<string> {
  let response: unknown;
  try {
    response = await agent.execute(prompt, context, options);
  } catch (err) {
    rethrow("agent", "Reasoning agent", err, options.signal);
  }

  const parsed = z.object({ text: z.string() }).safeParse(response);
  if (!parsed.success) {
    throw new CollaboratorError("agent", "Reasoning agent returned a response without text");
  }
  return parsed.data.text;
}

export async function callCompactor(
  compactor: Compactor,
  input: string,
  signal: AbortSignal
): Promise<string> {
  let compacted: unknown;
  try {
    compacted = await compactor.compact(input, { signal });
  } catch (err) {
    rethrow("compactor", "Compactor", err, signal);
  }

  if (typeof compacted !== "string") {
    throw new CollaboratorError("compactor", "Compactor returned a non-text result");
  }
  return compacted;
}

export async function callReranker(
  reranker: Reranker,
  candidates: readonly string[],
  query: string,
  signal: AbortSignal
): Promise<RankedCandidate[]> {
  let ranked: unknown;
  try {
    ranked = await reranker.rerank(candidates, query, { signal });
  } catch (err) {
    rethrow("reranker", "Reranker", err, signal);
  }

  const parsed = RankedCandidatesSchema.safeParse(ranked);
  if (!parsed.success) {
    throw new CollaboratorError("reranker", "Reranker returned malformed candidates");
  }
  return parsed.data;
}
