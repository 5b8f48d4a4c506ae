import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
  buildPrompt,
  CompletionClient,
  CompletionRequest,
  createLlmExtractor,
  LlmExtractor,
  parseLlmResponse,
} from "../src/services/llm.service";

class FakeCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: () => Promise<string>) {}

  complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return this.reply();
  }
}

const input = {
  text: "Thank you for applying to the Data Analyst role.",
  subject: "Application received",
  from: "jobs@acme.com",
};

describe("parseLlmResponse", () => {
  it("strips a markdown code fence", () => {
    const content = '```json\n{"company": "Acme", "position": "Data Analyst"}\n```';

    assert.deepEqual(parseLlmResponse(content), {
      company: "Acme",
      position: "Data Analyst",
    });
  });

  it("keeps the first entry of an array", () => {
    const content = '[{"company": "Acme", "position": null}, {"company": "Other"}]';

    assert.deepEqual(parseLlmResponse(content), { company: "Acme", position: null });
  });

  it("treats missing and blank fields as null", () => {
    assert.deepEqual(parseLlmResponse('{"company": "  "}'), {
      company: null,
      position: null,
    });
  });

  it("returns null for an empty array", () => {
    assert.equal(parseLlmResponse("[]"), null);
  });

  it("throws on malformed output", () => {
    assert.throws(() => parseLlmResponse("I cannot help with that"));
    assert.throws(() => parseLlmResponse('{"company": 42}'));
  });
});

describe("buildPrompt", () => {
  it("includes subject and sender and truncates the body", () => {
    const prompt = buildPrompt({ ...input, text: "a".repeat(5000) });

    assert.ok(prompt.includes("Email subject: Application received"));
    assert.ok(prompt.includes("From: jobs@acme.com"));
    assert.ok(prompt.includes("a".repeat(3000)));
    assert.equal(prompt.includes("a".repeat(3001)), false);
  });
});

describe("LlmExtractor", () => {
  it("sends a deterministic short completion request", async () => {
    const client = new FakeCompletionClient(async () =>
      '{"company": "Acme", "position": "Data Analyst"}'
    );
    const extractor = new LlmExtractor(client, "test-model");

    const result = await extractor.extract(input);

    assert.deepEqual(result, { company: "Acme", position: "Data Analyst" });
    assert.equal(client.requests.length, 1);
    assert.equal(client.requests[0].model, "test-model");
    assert.equal(client.requests[0].maxTokens, 150);
    assert.equal(client.requests[0].temperature, 0);
  });

  it("returns null when the request fails", async () => {
    const client = new FakeCompletionClient(async () => {
      throw new Error("timeout");
    });

    assert.equal(await new LlmExtractor(client, "test-model").extract(input), null);
  });

  it("returns null when the reply is not JSON", async () => {
    const client = new FakeCompletionClient(async () => "Sorry, no idea.");

    assert.equal(await new LlmExtractor(client, "test-model").extract(input), null);
  });
});

describe("createLlmExtractor", () => {
  it("is disabled without an API key", () => {
    assert.equal(
      createLlmExtractor({ model: "test-model", timeoutMs: 1000 }),
      null
    );
  });

  it("builds an extractor when a key is set", () => {
    const extractor = createLlmExtractor({
      apiKey: "test-key",
      model: "test-model",
      timeoutMs: 1000,
    });

    assert.ok(extractor instanceof LlmExtractor);
  });
});
