import { describe, expect, it } from "vitest";
import { compareMatchQuality, matchQuality } from "./companyMatching";

describe("matchQuality", () => {
  it("grades matches from exact to subsequence", () => {
    expect(matchQuality("Acme", "acme")).toBe("exact");
    expect(matchQuality("Acme Corp", "acm")).toBe("prefix");
    expect(matchQuality("Big Acme", "acm")).toBe("word_prefix");
    expect(matchQuality("Stacme", "acm")).toBe("substring");
    expect(matchQuality("Alpha Cement", "acm")).toBe("subsequence");
    expect(matchQuality("Globex", "acm")).toBeNull();
  });

  it("prefers a later word-start occurrence over an earlier mid-word one", () => {
    expect(matchQuality("Cobank Bank", "bank")).toBe("word_prefix");
  });

  it("does not apply subsequence matching to short queries", () => {
    expect(matchQuality("Alpha Cement", "ac")).toBeNull();
  });

  it("orders qualities best first", () => {
    expect(compareMatchQuality("prefix", "substring")).toBeLessThan(0);
    expect(compareMatchQuality("subsequence", "exact")).toBeGreaterThan(0);
  });
});
