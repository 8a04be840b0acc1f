import { describe, it, expect } from "vitest";
import { computeRelevanceScore, extractTags, MAX_TAGS } from "../../src/pipeline/techScoring";

describe("extractTags", () => {
  it("returns known terms in order of first appearance", () => {
    expect(extractTags("Nuevo modelo GPT", "Un modelo de OpenAI y otra API de GPT")).toEqual([
      "gpt",
      "openai",
      "api",
    ]);
  });

  it("matches whole words only", () => {
    expect(extractTags("Aire acondicionado", "Mapa de datos")).toEqual([]);
  });

  it("keeps at most MAX_TAGS", () => {
    const text = "ai ml llm gpt startup tech software data cloud saas api";
    expect(extractTags(text)).toHaveLength(MAX_TAGS);
  });
});

describe("computeRelevanceScore", () => {
  it("starts at the baseline", () => {
    expect(computeRelevanceScore("Nueva consola", null, "OTHER_TECH")).toBe(50);
  });

  it("adds category and keyword boosts", () => {
    expect(computeRelevanceScore("Un estudio", "Paper sobre redes", "RESEARCH")).toBe(60);
    expect(computeRelevanceScore("Nuevo LLM abierto", null, "AI_ML")).toBe(90);
    expect(computeRelevanceScore("Lanzamiento de GPT", null, "RELEASE_UPDATE")).toBe(80);
  });
});
