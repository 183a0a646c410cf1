export { getConfig, parseConfig, type Config, type OpenAIConfig, type PollingConfig } from "./config/index.js";

export { createOpenAIClient } from "./adapters/openai/client.js";
export { createOpenAIDocumentClient, type OpenAIResources } from "./adapters/openai/document-client.js";
export {
  createChatCompletion,
  normalizeChatRequest,
  type ChatCompletionsClient,
  type ChatRequest,
} from "./adapters/openai/chat-completions.js";
export type {
  ApiResult,
  Attachment,
  AttachmentStatusT,
  Collection,
  DocumentApiClient,
  RemoteFile,
  Turn,
  TurnOptions,
  TurnResult,
  TurnUsage,
} from "./adapters/openai/types.js";

export type { HistoryItemT, InputMessageT, OutputMessageT } from "./schemas/conversation.js";

export {
  defineStage,
  fail,
  getOutputs,
  initState,
  mergeStates,
  ok,
  removeHistory,
  removeOutput,
  runPipeline,
  startPipeline,
  updateExtra,
  type OutputsResult,
} from "./pipeline/result.js";
export type {
  ErrorResult,
  FailedState,
  HistorySelector,
  OkResult,
  PipelineResult,
  PipelineState,
  PipelineStep,
  Stage,
  StoredFile,
} from "./pipeline/types.js";
export { createCollection } from "./pipeline/collection.js";
export {
  confirmIngestion,
  uploadFile,
  uploadOptionalFile,
  uploadOutputAsFile,
  type OutputUploadOptions,
  type UploadOptions,
} from "./pipeline/upload.js";
export {
  uploadFiles,
  uploadOptionalFiles,
  uploadOptionalFilesSequentially,
  type UploadRequest,
} from "./pipeline/batch-upload.js";
export {
  pollAttachmentStatus,
  pollingOptionsFromConfig,
  waitForAttachment,
  type PollingOptions,
} from "./pipeline/polling.js";
export { cleanupResources, deleteFiles } from "./pipeline/cleanup.js";
export {
  createTurn,
  derived,
  firstOutputText,
  literal,
  type ConversationInput,
  type TurnStageOptions,
} from "./pipeline/conversation.js";

export { describeError, MissingCredentialError } from "./utils/errors.js";
export { flushMetrics, log } from "./utils/telemetry.js";
export { isBlank, oxfordJoin, stripCitations } from "./utils/text.js";
