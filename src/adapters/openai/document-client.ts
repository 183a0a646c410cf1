/**
 * OpenAI Document Client
 *
 * Production implementation of DocumentApiClient on top of the openai SDK:
 * files, vector stores (collections), vector store files (attachments) and
 * the Responses API (turns). Each method catches SDK errors and returns them
 * as ApiResult failures.
 *
 * The SDK surface is declared structurally (OpenAIResources) so tests can
 * wire in vi.fn() resources without a network.
 */

import { createReadStream, type ReadStream } from "node:fs";
import type OpenAI from "openai";
import { z } from "zod";
import type { HistoryItemT, OutputContentT, OutputMessageT } from "../../schemas/conversation.js";
import { log } from "../../utils/telemetry.js";
import { classifyUpstreamError, upstreamReason } from "./errors.js";
import {
  AttachmentStatus,
  apiError,
  apiOk,
  type ApiResult,
  type Attachment,
  type Collection,
  type DocumentApiClient,
  type RemoteFile,
  type Turn,
  type TurnOptions,
  type TurnResult,
} from "./types.js";

interface FileRecord {
  id: string;
  filename: string;
  bytes: number;
}

interface VectorStoreRecord {
  id: string;
  name: string;
}

/** Fields of a Responses API response that a Turn is built from. */
export type TurnResponse = Pick<OpenAI.Responses.Response, "id" | "model" | "status" | "output" | "usage">;

interface VectorStoreFileRecord {
  id: string;
  vector_store_id: string;
  status: string;
  last_error: { message: string } | null;
}

/**
 * The slice of the OpenAI SDK this client uses. An `OpenAI` instance
 * satisfies it as-is.
 */
export interface OpenAIResources {
  files: {
    create(body: { file: ReadStream; purpose: "assistants" }): PromiseLike<FileRecord>;
    delete(fileId: string): PromiseLike<unknown>;
    list(): AsyncIterable<FileRecord>;
  };
  vectorStores: {
    create(body: { name: string }): PromiseLike<VectorStoreRecord>;
    delete(vectorStoreId: string): PromiseLike<unknown>;
    list(): AsyncIterable<VectorStoreRecord>;
    files: {
      create(vectorStoreId: string, body: { file_id: string }): PromiseLike<VectorStoreFileRecord>;
      retrieve(fileId: string, params: { vector_store_id: string }): PromiseLike<VectorStoreFileRecord>;
    };
  };
  responses: {
    create(body: OpenAI.Responses.ResponseCreateParamsNonStreaming): PromiseLike<TurnResponse>;
    delete(responseId: string): PromiseLike<unknown>;
  };
  get(path: string, options: { query: Record<string, string> }): PromiseLike<unknown>;
}

const StatusPayload = z.object({ status: AttachmentStatus });

/**
 * Nonce that makes every poll request URL unique per (file, attempt).
 */
export function cacheBuster(fileId: string, attempt: number): string {
  return `${fileId}-${attempt}`;
}

function toAttachment(record: VectorStoreFileRecord, resource: string): ApiResult<Attachment> {
  const status = AttachmentStatus.safeParse(record.status);
  if (!status.success) {
    return apiError(`Unexpected attachment status "${record.status}" on ${resource}`);
  }
  return apiOk({
    id: record.id,
    collectionId: record.vector_store_id,
    status: status.data,
    lastError: record.last_error?.message ?? null,
  });
}

function toResponseInput(item: HistoryItemT): OpenAI.Responses.ResponseInputItem {
  if ("type" in item) {
    return {
      id: item.id,
      type: "message",
      role: "assistant",
      status: item.status,
      content: item.content.map((part) =>
        part.type === "output_text"
          ? { type: "output_text" as const, text: part.text, annotations: [] }
          : { type: "refusal" as const, refusal: part.refusal },
      ),
    };
  }
  return { role: item.role, content: item.content };
}

function fromOutputContent(
  part: OpenAI.Responses.ResponseOutputText | OpenAI.Responses.ResponseOutputRefusal,
): OutputContentT {
  return part.type === "output_text"
    ? { type: "output_text", text: part.text }
    : { type: "refusal", refusal: part.refusal };
}

/**
 * Convert an SDK response into a Turn. Message items are kept; every other
 * output item (tool calls, reasoning) is recorded by type only.
 */
export function toTurn(response: TurnResponse): Turn {
  const messages: OutputMessageT[] = [];
  const toolCalls: string[] = [];

  for (const item of response.output) {
    if (item.type === "message") {
      messages.push({
        id: item.id,
        type: "message",
        role: "assistant",
        status: item.status,
        content: item.content.map(fromOutputContent),
      });
    } else {
      toolCalls.push(item.type);
    }
  }

  return {
    id: response.id,
    model: String(response.model),
    status: response.status ?? null,
    messages,
    toolCalls,
    usage: response.usage
      ? { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens }
      : null,
  };
}

function logHistory(history: HistoryItemT[]): void {
  for (const item of history) {
    if ("type" in item) {
      log.debug({ role: item.role, message_id: item.id }, "Turn input (prior output)");
    } else {
      log.debug({ role: item.role, chars: item.content.length }, "Turn input");
    }
  }
}

export function createOpenAIDocumentClient(openai: OpenAIResources): DocumentApiClient {
  async function call<T>(
    operation: string,
    resource: string,
    run: () => Promise<ApiResult<T>>,
  ): Promise<ApiResult<T>> {
    const start = Date.now();
    try {
      return await run();
    } catch (error) {
      const failure = classifyUpstreamError(error);
      log.error(
        {
          operation,
          resource,
          status: failure.status,
          code: failure.code,
          request_id: failure.requestId,
          timed_out: failure.timedOut,
          elapsed_ms: Date.now() - start,
        },
        "OpenAI API call failed",
      );
      return apiError(upstreamReason(error, resource));
    }
  }

  return {
    uploadFile(path) {
      return call("upload_file", `file ${path}`, async () => {
        const file = await openai.files.create({ file: createReadStream(path), purpose: "assistants" });
        return apiOk<RemoteFile>({ id: file.id, filename: file.filename, bytes: file.bytes });
      });
    },

    deleteFile(fileId) {
      return call("delete_file", `file ${fileId}`, async () => {
        await openai.files.delete(fileId);
        log.info({ file_id: fileId }, "File deleted");
        return apiOk(undefined);
      });
    },

    listFiles() {
      return call("list_files", "files", async () => {
        const files: RemoteFile[] = [];
        for await (const file of openai.files.list()) {
          files.push({ id: file.id, filename: file.filename, bytes: file.bytes });
        }
        return apiOk(files);
      });
    },

    createCollection(name) {
      return call("create_collection", `vector store ${name}`, async () => {
        const store = await openai.vectorStores.create({ name });
        return apiOk<Collection>({ id: store.id, name: store.name });
      });
    },

    deleteCollection(collectionId) {
      return call("delete_collection", `vector store ${collectionId}`, async () => {
        await openai.vectorStores.delete(collectionId);
        log.warn({ collection_id: collectionId }, "Vector store deleted");
        return apiOk(undefined);
      });
    },

    listCollections() {
      return call("list_collections", "vector stores", async () => {
        const stores: Collection[] = [];
        for await (const store of openai.vectorStores.list()) {
          stores.push({ id: store.id, name: store.name });
        }
        return apiOk(stores);
      });
    },

    attachFile(fileId, collectionId) {
      const resource = `file ${fileId} to vector store ${collectionId}`;
      return call("attach_file", resource, async () => {
        const record = await openai.vectorStores.files.create(collectionId, { file_id: fileId });
        return toAttachment(record, resource);
      });
    },

    getAttachmentStatus(fileId, collectionId, attempt) {
      const resource = `file ${fileId} in vector store ${collectionId}`;
      return call("poll_attachment", resource, async () => {
        const raw = await openai.get(`/vector_stores/${collectionId}/files/${fileId}`, {
          query: { cache_buster: cacheBuster(fileId, attempt) },
        });
        const parsed = StatusPayload.safeParse(raw);
        if (!parsed.success) {
          return apiError(`Unexpected attachment status payload on ${resource}`);
        }
        return apiOk(parsed.data.status);
      });
    },

    getAttachment(fileId, collectionId) {
      const resource = `file ${fileId} from vector store ${collectionId}`;
      return call("get_attachment", resource, async () => {
        const record = await openai.vectorStores.files.retrieve(fileId, { vector_store_id: collectionId });
        return toAttachment(record, resource);
      });
    },

    createTurn(history, options: TurnOptions) {
      return call("create_turn", "responses", async () => {
        logHistory(history);
        const response = await openai.responses.create({
          ...options,
          input: history.map(toResponseInput),
          stream: false,
        });
        const turn = toTurn(response);
        const [reply] = turn.messages;
        const result: TurnResult = {
          turn,
          history: reply ? [...history, reply] : [...history],
        };
        return apiOk(result);
      });
    },

    deleteTurn(turnId) {
      return call("delete_turn", `response ${turnId}`, async () => {
        await openai.responses.delete(turnId);
        log.warn({ turn_id: turnId }, "Response deleted");
        return apiOk(undefined);
      });
    },
  };
}
