import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import fc from "fast-check";
import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import {
  IncompleteAssignmentError,
  MalformedAssignmentRecordError,
  UnknownDenseIdError,
} from "../../src/errors.js";
import { formatEdgeList } from "../../src/format/edgeList.js";
import { IdentifierKeyStore } from "../../src/keys/keyStore.js";
import { remapAssignments, remapPartitionFile, renderAssignments } from "../../src/remap/remapper.js";

describe("remap/remapAssignments", () => {
  const keys = IdentifierKeyStore.parse("A 1\nB 2\nC 3\n");

  it("replaces each line position with the label of that dense id", () => {
    const assignments = remapAssignments("0\n1\n0\n", keys);

    expect(renderAssignments(assignments)).to.equal("A 0\nB 1\nC 0\n");
  });

  it("orders output by dense id even when the key file is not", () => {
    const shuffled = IdentifierKeyStore.parse("C 3\nA 1\nB 2\n");

    expect(renderAssignments(remapAssignments("5\n6\n7\n", shuffled))).to.equal("A 5\nB 6\nC 7\n");
  });

  it("keeps each cluster label as written, trimming only surrounding whitespace", () => {
    expect(renderAssignments(remapAssignments(" 07\n+1\n-2 \n", keys))).to.equal("A 07\nB +1\nC -2\n");
  });

  it("preserves cluster labels beyond the safe integer range", () => {
    const single = IdentifierKeyStore.parse("A 1\n");

    expect(remapAssignments("12345678901234567891\n", single)).to.deep.equal([
      { label: "A", cluster: "12345678901234567891" },
    ]);
  });

  it("raises UnknownDenseIdError on the first position without a key", () => {
    let caught: unknown;
    try {
      remapAssignments("0\n1\n0\n1\n", keys);
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(UnknownDenseIdError);
    const unknown = caught as UnknownDenseIdError;
    expect(unknown.denseId).to.equal(4);
    expect(unknown.code).to.equal("E-DENSE-ID-UNKNOWN");
  });

  it("raises IncompleteAssignmentError when the partition is shorter than the key store", () => {
    expect(() => remapAssignments("0\n1\n", keys)).to.throw(IncompleteAssignmentError, "partition covers 2 of 3 nodes");
  });

  it("rejects lines that are not integers", () => {
    expect(() => remapAssignments("0\nx\n0\n", keys)).to.throw(MalformedAssignmentRecordError);
    expect(() => remapAssignments("0\n\n0\n", keys)).to.throw(MalformedAssignmentRecordError);
  });

  it("agrees with a positional lookup through the key store for any labelling", () => {
    const labelArb = fc.stringMatching(/^[A-Za-z0-9_.:-]{1,8}$/);
    fc.assert(
      fc.property(
        fc.array(fc.tuple(labelArb, labelArb), { minLength: 1, maxLength: 40 }),
        fc.array(fc.integer({ min: 0, max: 9 }), { minLength: 80, maxLength: 80 }),
        (edges, clusterPool) => {
          const formatted = formatEdgeList(edges.map(([source, target]) => `${source} ${target}`).join("\n"));
          const partitionLines = formatted.keys.denseIds().map((denseId) => String(clusterPool[denseId - 1]));
          const remapped = remapAssignments(partitionLines.map((cluster) => `${cluster}\n`).join(""), formatted.keys);

          expect(remapped).to.have.length(formatted.nodeCount);
          remapped.forEach((assignment, index) => {
            expect(assignment.label).to.equal(formatted.keys.labelFor(index + 1));
            expect(assignment.cluster).to.equal(partitionLines[index]);
          });
        },
      ),
      { numRuns: 50 },
    );
  });
});

describe("remap/remapPartitionFile", () => {
  let tempRoot: string;

  beforeEach(async () => {
    tempRoot = await mkdtemp(path.join(tmpdir(), "gcm-remap-"));
  });

  afterEach(async () => {
    await rm(tempRoot, { recursive: true, force: true });
  });

  it("rewrites the partition file in place", async () => {
    const partition = path.join(tempRoot, "partition_g_formatted.txt");
    await writeFile(partition, "0\n1\n0\n", "utf8");

    const assignments = await remapPartitionFile(partition, IdentifierKeyStore.parse("A 1\nB 2\nC 3\n"));

    expect(assignments).to.deep.equal([
      { label: "A", cluster: "0" },
      { label: "B", cluster: "1" },
      { label: "C", cluster: "0" },
    ]);
    expect(await readFile(partition, "utf8")).to.equal("A 0\nB 1\nC 0\n");
  });

  it("leaves the positional file untouched when validation fails", async () => {
    const partition = path.join(tempRoot, "partition_g_formatted.txt");
    await writeFile(partition, "0\n1\n0\n1\n", "utf8");

    let caught: unknown;
    try {
      await remapPartitionFile(partition, IdentifierKeyStore.parse("A 1\nB 2\nC 3\n"));
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(UnknownDenseIdError);
    expect(await readFile(partition, "utf8")).to.equal("0\n1\n0\n1\n");
  });
});
