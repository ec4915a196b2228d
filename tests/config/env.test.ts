import { describe, it } from "mocha";
import { expect } from "chai";

import { readList, readOptionalInt, readOptionalString, readString } from "../../src/config/env.js";

describe("config/env", () => {
  it("trims strings and treats blanks as unset", () => {
    const env = { GCM_A: "  value ", GCM_B: "   " };

    expect(readOptionalString("GCM_A", env)).to.equal("value");
    expect(readOptionalString("GCM_B", env)).to.equal(undefined);
    expect(readString("GCM_B", "fallback", env)).to.equal("fallback");
    expect(readString("GCM_MISSING", "fallback", env)).to.equal("fallback");
  });

  it("ignores integers that are malformed or out of bounds", () => {
    const env = { OK: "1500", NEG: "-4", FLOAT: "2.5", WORD: "soon" };

    expect(readOptionalInt("OK", { min: 1 }, env)).to.equal(1500);
    expect(readOptionalInt("NEG", { min: 1 }, env)).to.equal(undefined);
    expect(readOptionalInt("NEG", {}, env)).to.equal(-4);
    expect(readOptionalInt("OK", { max: 1000 }, env)).to.equal(undefined);
    expect(readOptionalInt("FLOAT", {}, env)).to.equal(undefined);
    expect(readOptionalInt("WORD", {}, env)).to.equal(undefined);
  });

  it("splits lists on commas and whitespace without duplicates", () => {
    expect(readList("L", { L: "OMP_NUM_THREADS, LD_LIBRARY_PATH OMP_NUM_THREADS,," })).to.deep.equal([
      "OMP_NUM_THREADS",
      "LD_LIBRARY_PATH",
    ]);
    expect(readList("L", {})).to.deep.equal([]);
  });
});
