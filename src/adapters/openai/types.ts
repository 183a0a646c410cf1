/**
 * Document API collaborator contract.
 *
 * Every pipeline stage talks to the remote service through this interface
 * only. Implementations never throw across it: failures come back as
 * `{ ok: false, reason }` with a message that names the operation and the
 * resource involved.
 */

import type OpenAI from "openai";
import { z } from "zod";
import type { HistoryItemT, OutputMessageT } from "../../schemas/conversation.js";

export type ApiResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export function apiOk<T>(value: T): ApiResult<T> {
  return { ok: true, value };
}

export function apiError<T = never>(reason: string): ApiResult<T> {
  return { ok: false, reason };
}

export const AttachmentStatus = z.enum([
  "queued",
  "in_progress",
  "completed",
  "failed",
  "cancelled",
  "expired",
]);
export type AttachmentStatusT = z.infer<typeof AttachmentStatus>;

export interface RemoteFile {
  id: string;
  filename: string;
  bytes: number;
}

export interface Collection {
  id: string;
  name: string;
}

/** Association of an uploaded file with a collection. */
export interface Attachment {
  id: string;
  collectionId: string;
  status: AttachmentStatusT;
  lastError: string | null;
}

export interface TurnUsage {
  inputTokens: number;
  outputTokens: number;
}

/** One request/response exchange with the Responses API. */
export interface Turn {
  id: string;
  model: string;
  status: string | null;
  messages: OutputMessageT[];
  /** Output item types other than messages, e.g. "file_search_call" */
  toolCalls: string[];
  usage: TurnUsage | null;
}

export interface TurnResult {
  turn: Turn;
  history: HistoryItemT[];
}

/**
 * Request options for a turn: everything the Responses API takes except
 * the input, which the pipeline owns, and streaming, which it does not use.
 */
export type TurnOptions = Omit<OpenAI.Responses.ResponseCreateParamsNonStreaming, "input" | "stream">;

export type TurnTool = OpenAI.Responses.Tool;

export interface DocumentApiClient {
  uploadFile(path: string): Promise<ApiResult<RemoteFile>>;
  deleteFile(fileId: string): Promise<ApiResult<void>>;
  listFiles(): Promise<ApiResult<RemoteFile[]>>;

  createCollection(name: string): Promise<ApiResult<Collection>>;
  deleteCollection(collectionId: string): Promise<ApiResult<void>>;
  listCollections(): Promise<ApiResult<Collection[]>>;

  attachFile(fileId: string, collectionId: string): Promise<ApiResult<Attachment>>;
  /**
   * Current ingestion status. `attempt` is folded into a cache-busting
   * query parameter so no intermediary can replay an older poll.
   */
  getAttachmentStatus(fileId: string, collectionId: string, attempt: number): Promise<ApiResult<AttachmentStatusT>>;
  getAttachment(fileId: string, collectionId: string): Promise<ApiResult<Attachment>>;

  createTurn(history: HistoryItemT[], options: TurnOptions): Promise<ApiResult<TurnResult>>;
  deleteTurn(turnId: string): Promise<ApiResult<void>>;
}
