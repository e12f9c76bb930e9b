import { expect } from "chai";
import { InMemoryCorpusSource, TICKET_ENTRIES } from "../test/fixtures.js";
import { NO_RELEVANT_ENDPOINT_CONTEXT } from "../search/context-assembler.js";
import { DEFAULT_RETRIEVAL_SETTINGS, RetrievalService } from "./retrieval-service.js";

const AGENT_ENTRIES = [
  { method: "GET", path: "/agents", description: "List all agents" },
  { method: "GET", path: "/agents/{id}", description: "View an agent" },
  { method: "DELETE", path: "/agents/{id}", description: "Remove an agent" },
];

describe("RetrievalService", () => {
  let source: InMemoryCorpusSource;
  let service: RetrievalService;

  beforeEach(async () => {
    source = new InMemoryCorpusSource(TICKET_ENTRIES);
    service = await RetrievalService.create(source);
  });

  describe("retrieve", () => {
    it("ranks and assembles against the current index", () => {
      const response = service.retrieve("How do I create a ticket?");

      expect(response.indexVersion).to.equal(1);
      expect(response.terms).to.deep.equal(["create", "ticket"]);
      expect(response.results.map((r) => r.path)).to.deep.equal([
        "/tickets",
        "/tickets/{id}",
      ]);
      expect(response.context.startsWith("Endpoint: POST /tickets\n")).to.equal(true);
    });

    it("honours an explicit k", () => {
      expect(service.retrieve("ticket", { k: 1 }).results).to.have.lengthOf(1);
    });

    it("caps k at the configured maximum", async () => {
      const capped = await RetrievalService.create(new InMemoryCorpusSource(AGENT_ENTRIES), {
        ...DEFAULT_RETRIEVAL_SETTINGS,
        maxResultCount: 2,
      });

      expect(capped.retrieve("agents", { k: 10 }).results).to.have.lengthOf(2);
    });

    it("returns the no-match context for a query of stop words", () => {
      const response = service.retrieve("what is the");

      expect(response.results).to.deep.equal([]);
      expect(response.context).to.equal(NO_RELEVANT_ENDPOINT_CONTEXT);
    });
  });

  describe("reload", () => {
    it("publishes a new index under the next version", async () => {
      source.entries = AGENT_ENTRIES;

      const result = await service.reload();

      expect(result).to.include({ success: true, version: 2 });
      expect(service.snapshot().version).to.equal(2);
      expect(service.snapshot().corpus.metadata.count).to.equal(3);
      expect(service.retrieve("agents").indexVersion).to.equal(2);
    });

    it("keeps the current index when the new corpus is empty", async () => {
      const before = service.snapshot();
      source.entries = [];

      const result = await service.reload();

      expect(result).to.deep.equal({
        success: false,
        version: 1,
        kind: "empty",
        error: "No valid endpoints in corpus (0 entries, 0 skipped)",
      });
      expect(service.snapshot()).to.equal(before);
      expect(service.retrieve("ticket").results).to.have.lengthOf(2);
    });

    it("keeps the current index when the new corpus is malformed", async () => {
      source.entries = { endpoint: [] };

      const result = await service.reload();

      expect(result.success).to.equal(false);
      expect(result.success === false && result.kind).to.equal("malformed");
      expect(service.snapshot().version).to.equal(1);
    });

    it("shares one load between concurrent callers", async () => {
      const loadsBefore = source.loads;

      const [first, second] = await Promise.all([service.reload(), service.reload()]);

      expect(source.loads - loadsBefore).to.equal(1);
      expect(first).to.equal(second);
      expect(service.snapshot().version).to.equal(2);
    });

    it("leaves a snapshot taken before the swap untouched", async () => {
      const held = service.snapshot();
      source.entries = AGENT_ENTRIES;

      await service.reload();

      expect(held.version).to.equal(1);
      expect(held.corpus.records.map((r) => r.path)).to.deep.equal([
        "/tickets",
        "/tickets/{id}",
      ]);
      expect(held.index.corpus).to.equal(held.corpus);
      expect(service.snapshot().corpus.records[0].path).to.equal("/agents");
    });
  });
});
