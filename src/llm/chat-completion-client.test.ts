import { expect } from "chai";
import sinon, { type SinonStub } from "sinon";
import { loadConfig } from "../config.js";
import { LlmError } from "../errors.js";
import {
  ChatCompletionClient,
  type ChatCompletionConfig,
  createAnswerGenerator,
  EMPTY_ANSWER,
} from "./chat-completion-client.js";
import { buildAnswerPrompt, SYSTEM_PROMPT } from "./prompts.js";

const CONFIG: ChatCompletionConfig = {
  baseUrl: "https://llm.example.com/v1",
  apiKey: "test-secret",
  model: "test-model",
  timeoutMs: 1000,
  maxRetries: 2,
  temperature: 0.1,
  maxTokens: 256,
  retryBaseDelayMs: 0,
};

const completion = (content: string | null): Response =>
  new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });

const requestBody = (init: RequestInit | undefined): unknown =>
  JSON.parse(typeof init?.body === "string" ? init.body : "null");

const expectLlmError = async (promise: Promise<unknown>): Promise<LlmError> => {
  try {
    await promise;
  } catch (error) {
    expect(error).to.be.instanceOf(LlmError);
    if (error instanceof LlmError) return error;
  }
  expect.fail("expected an LlmError");
};

describe("ChatCompletionClient", () => {
  let fetchStub: SinonStub<Parameters<typeof fetch>, ReturnType<typeof fetch>>;

  beforeEach(() => {
    fetchStub = sinon.stub(globalThis, "fetch");
  });

  afterEach(() => {
    sinon.restore();
  });

  it("posts the prompt and returns the trimmed answer", async () => {
    fetchStub.resolves(completion("  Send a POST request to /tickets.  "));
    const client = new ChatCompletionClient(CONFIG);

    const answer = await client.generateAnswer("create ticket", "Endpoint: POST /tickets\n");

    expect(answer).to.equal("Send a POST request to /tickets.");
    expect(fetchStub.calledOnce).to.equal(true);

    const [url, init] = fetchStub.firstCall.args;
    expect(url).to.equal("https://llm.example.com/v1/chat/completions");
    expect(init?.method).to.equal("POST");
    expect(init?.headers).to.deep.include({ Authorization: "Bearer test-secret" });
    expect(requestBody(init)).to.deep.include({
      model: "test-model",
      temperature: 0.1,
      max_tokens: 256,
      stream: false,
    });
  });

  it("sends the system prompt and the context-bearing user prompt", async () => {
    fetchStub.resolves(completion("ok"));
    const client = new ChatCompletionClient(CONFIG);

    await client.generateAnswer("create ticket", "Endpoint: POST /tickets\n");

    const body = requestBody(fetchStub.firstCall.args[1]);
    expect(body).to.have.nested.property("messages[0].content", SYSTEM_PROMPT);
    expect(body).to.have.nested.property(
      "messages[1].content",
      buildAnswerPrompt("create ticket", "Endpoint: POST /tickets\n")
    );
  });

  it("substitutes a fixed answer for empty content", async () => {
    fetchStub.resolves(completion("   "));
    const client = new ChatCompletionClient(CONFIG);

    expect(await client.generateAnswer("q", "c")).to.equal(EMPTY_ANSWER);
  });

  it("retries server errors and then succeeds", async () => {
    fetchStub.onFirstCall().resolves(new Response("overloaded", { status: 503 }));
    fetchStub.onSecondCall().resolves(new Response("rate limited", { status: 429 }));
    fetchStub.onThirdCall().resolves(completion("third time lucky"));
    const client = new ChatCompletionClient(CONFIG);

    expect(await client.generateAnswer("q", "c")).to.equal("third time lucky");
    expect(fetchStub.callCount).to.equal(3);
  });

  it("gives up after the configured number of retries", async () => {
    fetchStub.callsFake(async () => new Response("unavailable", { status: 500 }));
    const client = new ChatCompletionClient({ ...CONFIG, maxRetries: 1 });

    const error = await expectLlmError(client.generateAnswer("q", "c"));

    expect(error.status).to.equal(500);
    expect(error.message).to.equal("LLM API error 500: unavailable");
    expect(fetchStub.callCount).to.equal(2);
  });

  it("does not retry client errors", async () => {
    fetchStub.resolves(new Response("bad model", { status: 400 }));
    const client = new ChatCompletionClient(CONFIG);

    const error = await expectLlmError(client.generateAnswer("q", "c"));

    expect(error.retryable).to.equal(false);
    expect(fetchStub.callCount).to.equal(1);
  });

  it("rejects a response without choices", async () => {
    fetchStub.resolves(new Response(JSON.stringify({ choices: [] }), { status: 200 }));
    const client = new ChatCompletionClient(CONFIG);

    const error = await expectLlmError(client.generateAnswer("q", "c"));

    expect(error.message).to.equal("LLM API returned an unexpected response shape");
    expect(fetchStub.callCount).to.equal(1);
  });

  it("aborts a request that outlives the timeout", async () => {
    fetchStub.callsFake(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const client = new ChatCompletionClient({ ...CONFIG, timeoutMs: 10, maxRetries: 0 });

    const error = await expectLlmError(client.generateAnswer("q", "c"));

    expect(error.message).to.equal("LLM request failed: aborted");
  });

  it("stops before sending when the caller already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const client = new ChatCompletionClient(CONFIG);

    const error = await expectLlmError(
      client.generateAnswer("q", "c", controller.signal)
    );

    expect(error.message).to.equal("Answer generation cancelled");
    expect(fetchStub.called).to.equal(false);
  });
});

describe("createAnswerGenerator", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("returns null when generation is disabled", () => {
    expect(createAnswerGenerator(loadConfig({}))).to.equal(null);
  });

  it("uses the provider's default endpoint and model", async () => {
    const fetchStub = sinon.stub(globalThis, "fetch").resolves(completion("ok"));
    const generator = createAnswerGenerator(
      loadConfig({ LLM_PROVIDER: "groq", LLM_API_KEY: "test-secret" })
    );

    expect(generator).to.be.instanceOf(ChatCompletionClient);
    await generator?.generateAnswer("q", "c");

    const [url, init] = fetchStub.firstCall.args;
    expect(url).to.equal("https://api.groq.com/openai/v1/chat/completions");
    expect(requestBody(init)).to.deep.include({ model: "llama-3.3-70b-versatile" });
  });

  it("honours a base URL override without a trailing slash", async () => {
    const fetchStub = sinon.stub(globalThis, "fetch").resolves(completion("ok"));
    const generator = createAnswerGenerator(
      loadConfig({
        LLM_PROVIDER: "openai",
        LLM_API_KEY: "test-secret",
        LLM_BASE_URL: "http://localhost:8000/v1/",
        LLM_MODEL: "local-model",
      })
    );

    await generator?.generateAnswer("q", "c");

    const [url, init] = fetchStub.firstCall.args;
    expect(url).to.equal("http://localhost:8000/v1/chat/completions");
    expect(requestBody(init)).to.deep.include({ model: "local-model" });
  });
});
