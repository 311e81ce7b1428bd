import { describe, it, expect } from "vitest";
import {
  createSkillExpander,
  exactSkillExpander,
  FuzzySkillExpander,
  scoreSkillMatch,
  SynonymSkillExpander,
} from "../skill-matcher";

describe("scoreSkillMatch", () => {
  it("scores 1 when the job names no skills", () => {
    expect(scoreSkillMatch([], ["anything"])).toBe(1);
  });

  it("is the covered fraction of required skills", () => {
    expect(scoreSkillMatch(["Electrical", "Wiring"], ["electrical"])).toBe(0.5);
    expect(scoreSkillMatch(["electrical", "wiring"], ["wiring", "electrical", "lighting"])).toBe(1);
  });

  it("scores 0 for a provider without skills", () => {
    expect(scoreSkillMatch(["plumbing"], [])).toBe(0);
  });

  it("ignores case, padding and duplicate tags", () => {
    expect(scoreSkillMatch(["wiring", " WIRING ", "hvac"], ["Wiring"])).toBe(0.5);
  });
});

describe("SynonymSkillExpander", () => {
  const expander = new SynonymSkillExpander();

  it("treats group members as interchangeable in both directions", () => {
    expect(expander.covers("plumbing", ["plumber"])).toBe(true);
    expect(expander.covers("plumber", ["plumbing"])).toBe(true);
    expect(expander.covers("plumber", ["pipework"])).toBe(true);
  });

  it("does not cross group boundaries", () => {
    expect(expander.covers("plumbing", ["electrician"])).toBe(false);
  });

  it("falls back to the skill itself when no group exists", () => {
    expect([...expander.equivalents("beekeeping")]).toEqual(["beekeeping"]);
  });

  it("raises a match score that exact matching leaves at 0", () => {
    expect(scoreSkillMatch(["plumber"], ["plumbing"])).toBe(0);
    expect(scoreSkillMatch(["plumber"], ["plumbing"], expander)).toBe(1);
  });

  it("accepts a custom table", () => {
    const custom = new SynonymSkillExpander({ tiling: ["tiler"] });
    expect(custom.covers("tiler", ["tiling"])).toBe(true);
    expect(custom.covers("plumber", ["plumbing"])).toBe(false);
  });
});

describe("FuzzySkillExpander", () => {
  const expander = new FuzzySkillExpander();

  it("covers a misspelt tag", () => {
    expect(expander.covers("electrcal", ["electrical"])).toBe(true);
  });

  it("does not match unrelated trades", () => {
    expect(expander.covers("plumbing", ["electrical"])).toBe(false);
  });

  it("never matches against an empty skill list", () => {
    expect(expander.covers("electrical", [])).toBe(false);
  });
});

describe("createSkillExpander", () => {
  it("returns the expander for each mode", () => {
    expect(createSkillExpander("none")).toBe(exactSkillExpander);
    expect(createSkillExpander("synonyms").name).toBe("synonyms");
    expect(createSkillExpander("fuzzy").name).toBe("fuzzy");
  });
});
