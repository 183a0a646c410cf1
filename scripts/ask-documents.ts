/**
 * Ask a question about local documents (dev-only)
 *
 * Creates a vector store, uploads the given files into it, asks one
 * question with file search enabled, prints the answer and deletes every
 * remote resource the run created.
 *
 * Usage (from repo root, OPENAI_API_KEY in .env):
 *
 *   npm run ask -- --question "What changed in Q3?" docs/q2.md docs/q3.md
 *   npm run ask -- -q "Summarise the plan" -m gpt-4.1-mini plan.pdf
 */

import dotenv from "dotenv";
import { basename } from "node:path";

import { getConfig } from "../src/config/index.js";
import { createOpenAIClient } from "../src/adapters/openai/client.js";
import { createOpenAIDocumentClient } from "../src/adapters/openai/document-client.js";
import { createCollection } from "../src/pipeline/collection.js";
import { uploadFiles } from "../src/pipeline/batch-upload.js";
import { createTurn, literal } from "../src/pipeline/conversation.js";
import { cleanupResources } from "../src/pipeline/cleanup.js";
import { pollingOptionsFromConfig } from "../src/pipeline/polling.js";
import { getOutputs, runPipeline, startPipeline } from "../src/pipeline/result.js";
import { flushMetrics } from "../src/utils/telemetry.js";
import { oxfordJoin } from "../src/utils/text.js";

dotenv.config();

const DEFAULT_MODEL = "gpt-4.1-mini";

interface CliOptions {
  question: string;
  model: string;
  paths: string[];
}

function parseArgs(argv: string[]): CliOptions {
  let question: string | undefined;
  let model = DEFAULT_MODEL;
  const paths: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--question" || arg === "-q") {
      question = argv[i + 1];
      i += 1;
    } else if (arg === "--model" || arg === "-m") {
      const value = argv[i + 1];
      if (!value) throw new Error("Missing --model value");
      model = value;
      i += 1;
    } else if (arg !== undefined) {
      paths.push(arg);
    }
  }

  if (!question) throw new Error("Missing --question");
  if (paths.length === 0) throw new Error("Give at least one document path");
  return { question, model, paths };
}

async function main(): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error("[ask-documents] Argument error:", error instanceof Error ? error.message : String(error));
    return 1;
  }

  const config = getConfig();
  const client = createOpenAIDocumentClient(createOpenAIClient(config.openai));
  const polling = pollingOptionsFromConfig(config.polling);
  const names = options.paths.map((path) => basename(path));

  console.log(`[ask-documents] Asking about ${oxfordJoin(names)}`);

  const result = await runPipeline(
    startPipeline(client),
    (r) => createCollection(r, `ask-documents-${Date.now()}`),
    (r) => uploadFiles(r, options.paths.map((path) => ({ label: basename(path), path })), { polling }),
    (r) =>
      createTurn(
        r,
        literal([
          { role: "developer", content: "Answer using only the attached documents." },
          { role: "user", content: options.question },
        ]),
        { model: options.model },
        { withFileSearch: true, stripCitations: true },
      ),
  );

  await cleanupResources(result);
  await flushMetrics();

  const outputs = getOutputs(result);
  if (!outputs.ok) {
    console.error("[ask-documents] Failed:", outputs.error);
    return 1;
  }

  console.log(outputs.outputs.join("\n\n"));
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("[ask-documents] Unexpected error:", error);
    process.exitCode = 1;
  });
