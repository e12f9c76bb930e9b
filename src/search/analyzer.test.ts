import { expect } from "chai";
import { analyze, normalize } from "./analyzer.js";

describe("normalize", () => {
  it("lower-cases and drops stop words and single characters", () => {
    expect(normalize("How do I create a ticket?")).to.deep.equal([
      "create",
      "ticket",
    ]);
  });

  it("splits paths and identifiers on non-alphanumeric boundaries", () => {
    expect(normalize("/api/v2/tickets/{id}")).to.deep.equal([
      "api",
      "v2",
      "tickets",
      "id",
    ]);
    expect(normalize("requester_id")).to.deep.equal(["requester", "id"]);
  });

  it("does not stem", () => {
    expect(normalize("ticket tickets")).to.deep.equal(["ticket", "tickets"]);
  });
});

describe("analyze", () => {
  it("keeps duplicate terms in order and records the distinct set", () => {
    const query = analyze("ticket TICKET tickets");

    expect(query.raw).to.equal("ticket TICKET tickets");
    expect(query.terms).to.deep.equal(["ticket", "ticket", "tickets"]);
    expect(query.distinctTerms).to.deep.equal(["ticket", "tickets"]);
    expect(query.normalized).to.equal("ticket ticket tickets");
  });

  it("returns a query with no terms when nothing survives normalization", () => {
    const query = analyze("the a I ?");

    expect(query.terms).to.deep.equal([]);
    expect(query.distinctTerms).to.deep.equal([]);
    expect(query.normalized).to.equal("");
  });
});
