import { expect } from "chai";
import { corpusOf, TICKET_ENTRIES } from "../test/fixtures.js";
import { analyze } from "./analyzer.js";
import {
  assessContextRichness,
  assessQueryQuality,
  computeConfidence,
  MIN_CONFIDENCE,
} from "./confidence.js";
import { assemble, NO_RELEVANT_ENDPOINT_CONTEXT } from "./context-assembler.js";
import { buildIndex } from "./indexer.js";
import { rank } from "./ranker.js";

describe("assessQueryQuality", () => {
  it("rewards longer queries that use API vocabulary", () => {
    expect(assessQueryQuality("How do I create a ticket?")).to.be.closeTo(0.52, 1e-9);
    expect(assessQueryQuality("get list")).to.be.closeTo(0.38, 1e-9);
    expect(assessQueryQuality("tickets")).to.be.closeTo(0.12, 1e-9);
  });
});

describe("assessContextRichness", () => {
  it("is zero for an empty context", () => {
    expect(assessContextRichness("")).to.equal(0);
  });

  it("scores the no-match sentinel as thin", () => {
    expect(assessContextRichness(NO_RELEVANT_ENDPOINT_CONTEXT)).to.equal(0.1);
  });

  it("credits parameter and example sections", () => {
    const context = [
      "Endpoint: Create a Ticket (POST)",
      "Relevance: 2.50",
      "Method: POST",
      "Path: /tickets",
      "Description: Create a new ticket",
      "Tags: Support",
      "Parameters:",
      "  - subject (string, body) [Required]",
      "  - priority (integer, body)",
      "Example:",
      "curl -X POST https://helpdesk.example.com/tickets",
      "",
    ].join("\n");

    expect(assessContextRichness(context)).to.be.closeTo(0.9, 1e-9);
  });
});

describe("computeConfidence", () => {
  const index = buildIndex(corpusOf(TICKET_ENTRIES));

  it("combines coverage, query quality and context richness", () => {
    const query = analyze("How do I create a ticket?");
    const response = assemble(index, query, rank(index, query, 5), 10000);

    // coverage 1, query quality 0.52, richness 0.4 + 0.1 for two endpoints
    expect(computeConfidence(response)).to.be.closeTo(0.6 + 0.104 + 0.1, 1e-9);
  });

  it("is the floor when nothing matched", () => {
    const query = analyze("weather");
    const response = assemble(index, query, [], 10000);

    expect(computeConfidence(response)).to.equal(MIN_CONFIDENCE);
  });

  it("never drops below the floor", () => {
    expect(
      computeConfidence({
        query: "",
        terms: ["ticket"],
        results: [
          {
            recordIndex: 0,
            method: "GET",
            path: "/tickets",
            description: "",
            score: 1,
            matchedTerms: [],
          },
        ],
        context: "",
        omitted: 0,
      })
    ).to.equal(MIN_CONFIDENCE);
  });
});
