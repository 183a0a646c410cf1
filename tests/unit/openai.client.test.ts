import { describe, it, expect } from "vitest";
import OpenAI from "openai";
import { createOpenAIClient } from "../../src/adapters/openai/client.js";
import { parseConfig } from "../../src/config/index.js";
import { MissingCredentialError } from "../../src/utils/errors.js";

describe("createOpenAIClient", () => {
  it("refuses to build a client without an API key", () => {
    const { openai } = parseConfig({});

    expect(() => createOpenAIClient(openai)).toThrow(MissingCredentialError);
    expect(() => createOpenAIClient(openai)).toThrow("Missing OpenAI API key in config (set OPENAI_API_KEY)");
  });

  it("builds an SDK client from configuration", () => {
    const { openai } = parseConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_ORG_ID: "org-test",
      OPENAI_BASE_URL: "http://localhost:8080/v1",
      OPENAI_TIMEOUT_MS: "5000",
      OPENAI_MAX_RETRIES: "0",
    });

    const client = createOpenAIClient(openai);

    expect(client).toBeInstanceOf(OpenAI);
    expect(client.apiKey).toBe("test-secret");
    expect(client.organization).toBe("org-test");
    expect(client.project).toBeNull();
    expect(client.baseURL).toBe("http://localhost:8080/v1");
    expect(client.timeout).toBe(5000);
    expect(client.maxRetries).toBe(0);
  });
});
