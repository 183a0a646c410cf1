/**
 * Pipeline Types
 *
 * The aggregate state threaded through every stage, and the result
 * envelope that wraps it. State values are treated as immutable: a stage
 * returns a new state, it never edits the one it was given.
 */

import type {
  Attachment,
  Collection,
  DocumentApiClient,
  RemoteFile,
  Turn,
} from "../adapters/openai/types.js";
import type { HistoryItemT } from "../schemas/conversation.js";

/** Uploaded file, annotated with its attachment once one exists. */
export interface StoredFile extends RemoteFile {
  attachment?: Attachment;
}

export interface PipelineState {
  readonly client: DocumentApiClient;
  /** Caller-chosen label → uploaded file */
  readonly files: Readonly<Record<string, StoredFile>>;
  readonly collection: Collection | null;
  /** Every turn issued so far, in call order */
  readonly turns: readonly Turn[];
  readonly history: readonly HistoryItemT[];
  /** Extracted text per turn, index-aligned with `turns` */
  readonly outputs: readonly string[];
  readonly error: string | null;
  /** Caller-defined values passed between custom stages */
  readonly extra: Readonly<Record<string, unknown>>;
}

export type FailedState = PipelineState & { readonly error: string };

export type OkResult = { readonly ok: true; readonly state: PipelineState };
export type ErrorResult = { readonly ok: false; readonly state: FailedState };
export type PipelineResult = OkResult | ErrorResult;

/** A stage body: runs only on healthy state. */
export type StageBody<A extends unknown[]> = (state: PipelineState, ...args: A) => Promise<PipelineResult>;

/** A composed stage: accepts either arm and short-circuits on failure. */
export type Stage<A extends unknown[]> = (result: PipelineResult, ...args: A) => Promise<PipelineResult>;

export type PipelineStep = (result: PipelineResult) => PipelineResult | Promise<PipelineResult>;

/** Index, or inclusive index range, into `history`. */
export type HistorySelector = number | { from: number; to: number };
