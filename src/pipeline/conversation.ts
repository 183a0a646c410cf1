/**
 * Conversation Stage
 *
 * Issues one Responses API turn. The request history is either the current
 * history plus literal messages, or whatever a builder derives from the
 * whole state (for prompts that quote earlier outputs).
 */

import type { Turn, TurnOptions, TurnTool } from "../adapters/openai/types.js";
import { History, type HistoryItemT } from "../schemas/conversation.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { stripCitations } from "../utils/text.js";
import { defineStage, fail, ok } from "./result.js";
import type { PipelineState } from "./types.js";

export type HistoryBuilder = (
  state: PipelineState,
) => readonly HistoryItemT[] | Promise<readonly HistoryItemT[]>;

export type ConversationInput =
  | { kind: "literal"; messages: readonly HistoryItemT[] }
  | { kind: "derived"; build: HistoryBuilder };

export function literal(messages: readonly HistoryItemT[]): ConversationInput {
  return { kind: "literal", messages };
}

export function derived(build: HistoryBuilder): ConversationInput {
  return { kind: "derived", build };
}

export interface TurnStageOptions {
  /** Give the model a file_search tool over the active collection */
  withFileSearch?: boolean;
  /** Remove 【…】 citation markers from the extracted output */
  stripCitations?: boolean;
}

/**
 * Text of the first output_text part of the turn, or null when the model
 * produced none (refusal, tool calls only).
 */
export function firstOutputText(turn: Turn): string | null {
  for (const message of turn.messages) {
    for (const part of message.content) {
      if (part.type === "output_text") return part.text;
    }
  }
  return null;
}

async function requestHistory(state: PipelineState, input: ConversationInput): Promise<unknown> {
  switch (input.kind) {
    case "literal":
      return [...state.history, ...input.messages];
    case "derived":
      return input.build(state);
  }
}

function isConversationInput(input: unknown): input is ConversationInput {
  if (typeof input !== "object" || input === null || !("kind" in input)) return false;
  if (input.kind === "literal") return "messages" in input && Array.isArray(input.messages);
  if (input.kind === "derived") return "build" in input && typeof input.build === "function";
  return false;
}

function withFileSearch(turnOptions: TurnOptions, state: PipelineState, options: TurnStageOptions): TurnOptions {
  if (!options.withFileSearch || !state.collection) return turnOptions;

  const fileSearch: TurnTool = { type: "file_search", vector_store_ids: [state.collection.id] };
  return { ...turnOptions, tools: [...(turnOptions.tools ?? []), fileSearch] };
}

export const createTurn = defineStage(
  "create_turn",
  async (
    state: PipelineState,
    input: ConversationInput,
    turnOptions: TurnOptions,
    options: TurnStageOptions = {},
  ) => {
    if (!isConversationInput(input)) {
      return fail(state, "Request input must be a function or a list");
    }

    const history = History.safeParse(await requestHistory(state, input));
    if (!history.success) {
      return fail(state, "Conversation must be a list of messages");
    }

    const created = await state.client.createTurn(history.data, withFileSearch(turnOptions, state, options));
    if (!created.ok) {
      emit(TelemetryEvents.TurnFailed, { model: String(turnOptions.model), reason: created.reason });
      return fail(state, created.reason);
    }

    const { turn } = created.value;
    let text = firstOutputText(turn);
    if (text === null) {
      log.warn({ turn_id: turn.id, tool_calls: turn.toolCalls }, "Turn produced no output text");
      text = "";
    }
    if (options.stripCitations) {
      text = stripCitations(text);
    }

    emit(TelemetryEvents.TurnCreated, {
      turn_id: turn.id,
      model: turn.model,
      input_tokens: turn.usage?.inputTokens,
      output_tokens: turn.usage?.outputTokens,
      tool_calls: turn.toolCalls,
    });

    return ok({
      ...state,
      turns: [...state.turns, turn],
      outputs: [...state.outputs, text],
      history: created.value.history,
    });
  },
);
