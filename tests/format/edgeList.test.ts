import fc from "fast-check";
import { describe, it } from "mocha";
import { expect } from "chai";

import { EdgeListFormatError } from "../../src/errors.js";
import { formatEdgeList, isEdgeSeparator } from "../../src/format/edgeList.js";

describe("format/formatEdgeList", () => {
  it("assigns dense ids by first appearance, source before target", () => {
    const result = formatEdgeList("x y\ny z\nz x\n");

    expect(result.formatted).to.equal("1 2\n2 3\n3 1\n");
    expect(result.keyFile).to.equal("x 1\ny 2\nz 3\n");
    expect(result.nodeCount).to.equal(3);
    expect(result.edgeCount).to.equal(3);
  });

  it("skips blank lines and tolerates runs of whitespace", () => {
    const result = formatEdgeList("  alpha\t beta  \n\n\nbeta gamma\n");

    expect(result.formatted).to.equal("1 2\n2 3\n");
    expect(result.keys.labelFor(3)).to.equal("gamma");
  });

  it("keeps columns after the first two", () => {
    expect(formatEdgeList("a b 0.5\nb c 2\n").formatted).to.equal("1 2 0.5\n2 3 2\n");
  });

  it("splits on the requested separator and keeps it in the output", () => {
    const comma = formatEdgeList("n-1, n-2\nn-2,n-3\n", "comma");
    expect(comma.formatted).to.equal("1,2\n2,3\n");
    expect(comma.keyFile).to.equal("n-1 1\nn-2 2\nn-3 3\n");

    const semicolon = formatEdgeList("p;q;7\n", "semicolon");
    expect(semicolon.formatted).to.equal("1;2;7\n");
  });

  it("reports the offending line when a record has a single field", () => {
    let caught: unknown;
    try {
      formatEdgeList("a b\nlonely\n");
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(EdgeListFormatError);
    const formatError = caught as EdgeListFormatError;
    expect(formatError.message).to.equal("expected at least two fields separated by space (line 2)");
    expect(formatError.details).to.deep.equal({ lineNumber: 2, line: "lonely" });
  });

  it("rejects labels that would break the key file", () => {
    expect(() => formatEdgeList("a b,c\n", "comma")).to.throw(EdgeListFormatError, 'invalid node label "a b"');
    expect(() => formatEdgeList(",c\n", "comma")).to.throw(EdgeListFormatError, 'invalid node label ""');
  });

  it("produces a key store whose ids are exactly 1..N with one label each", () => {
    const labelArb = fc.stringMatching(/^[a-z0-9]{1,5}$/);
    fc.assert(
      fc.property(fc.array(fc.tuple(labelArb, labelArb), { maxLength: 30 }), (edges) => {
        const result = formatEdgeList(edges.map(([source, target]) => `${source} ${target}\n`).join(""));
        const distinct = new Set(edges.flat());

        expect(result.nodeCount).to.equal(distinct.size);
        expect(result.keys.gaps()).to.deep.equal([]);
        expect(result.keys.duplicates).to.deep.equal([]);
        const labels = result.keys.denseIds().map((denseId) => result.keys.labelFor(denseId));
        expect(new Set(labels)).to.deep.equal(distinct);
      }),
      { numRuns: 60 },
    );
  });
});

describe("format/isEdgeSeparator", () => {
  it("accepts the three known names only", () => {
    expect(["space", "comma", "semicolon"].every(isEdgeSeparator)).to.equal(true);
    expect(isEdgeSeparator("tab")).to.equal(false);
    expect(isEdgeSeparator("Comma")).to.equal(false);
  });
});
