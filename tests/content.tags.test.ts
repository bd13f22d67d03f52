import { describe, it } from "mocha";
import { expect } from "chai";

import { InvalidTagError } from "../src/errors.js";
import { hasTag, normaliseTags, parseTag, subtags } from "../src/content/tags.js";

describe("content tags", () => {
  it("splits, de-duplicates and sorts tag strings", () => {
    expect(normaliseTags("raw calibrated  raw")).to.deep.equal(["calibrated", "raw"]);
    expect(normaliseTags(["system:32", "a-1"])).to.deep.equal(["a-1", "system:32"]);
    expect(normaliseTags(undefined)).to.deep.equal([]);
  });

  it("trims a valid tag", () => {
    expect(parseTag(" mega-man:torso:component:12 ")).to.equal("mega-man:torso:component:12");
  });

  it("rejects tags outside the allowed alphabet", () => {
    for (const candidate of ["Upper", "-leading", "trailing:", "spa ce", ""]) {
      expect(() => parseTag(candidate), candidate).to.throw(InvalidTagError);
    }
    expect(() => parseTag(5)).to.throw(InvalidTagError, "invalid tag 5: tags must be strings");
  });

  it("lists subtags and matches normalised tags", () => {
    expect(subtags(["a:b", "c", "b"])).to.deep.equal(["a", "b", "c"]);
    expect(hasTag(["x:y"], " x:y ")).to.equal(true);
    expect(hasTag(["x:y"], "x")).to.equal(false);
  });
});
