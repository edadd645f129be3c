// src/state.ts
import { PipelineStateError } from "./errors.js";

export type Article = {
  readonly title: string;
  readonly url: string;
  readonly content: string;
  readonly publishedDate?: string;
};

export type Summary = {
  readonly title: string;
  readonly url: string;
  readonly summary: string;
};

export type AwaitingSearch = { readonly status: "AWAITING_SEARCH" };

export type AwaitingSummary = {
  readonly status: "AWAITING_SUMMARY";
  readonly articles: readonly Article[];
};

export type AwaitingPublish = {
  readonly status: "AWAITING_PUBLISH";
  readonly articles: readonly Article[];
  readonly summaries: readonly Summary[];
};

export type Done = {
  readonly status: "DONE";
  readonly articles: readonly Article[];
  readonly summaries: readonly Summary[];
  readonly report: string;
  readonly reportPath: string;
};

/**
 * The record threaded through the pipeline. Each stage accepts exactly one
 * variant and returns the next, so a stage can never see a field that an
 * earlier stage has not produced yet.
 */
export type WorkflowState = AwaitingSearch | AwaitingSummary | AwaitingPublish | Done;

export type WorkflowStatus = WorkflowState["status"];

export function initialState(): AwaitingSearch {
  return { status: "AWAITING_SEARCH" };
}

/** Narrow a state read back from the graph channel to the variant a node expects. */
export function expectStatus<S extends WorkflowStatus>(
  state: WorkflowState | undefined,
  status: S
): Extract<WorkflowState, { status: S }> {
  if (!state) {
    throw new PipelineStateError(`Expected state ${status} but the pipeline has no state`);
  }
  if (!isStatus(state, status)) {
    throw new PipelineStateError(`Expected state ${status} but found ${state.status}`);
  }
  return state;
}

function isStatus<S extends WorkflowStatus>(
  state: WorkflowState,
  status: S
): state is Extract<WorkflowState, { status: S }> {
  return state.status === status;
}
