import { describe, it, expect } from "vitest";
import { ConfigError } from "../../src/lib/errors";
import { loadBrandTemplates, parseBrandTemplates } from "../../src/social/templates";

function validHashtags(): Record<string, unknown> {
  return {
    base: ["#a"],
    byCategory: { A: ["#b"] },
    defaultCategory: ["#c"],
    extras: ["#d"],
    fillerPrefix: "#f",
    min: 2,
    max: 4,
  };
}

function valid(): Record<string, unknown> {
  return {
    hooks: ["Hook."],
    ctas: ["Cta."],
    closers: ["Closer."],
    readings: { A: "Reading." },
    defaultReading: "Default.",
    hashtags: validHashtags(),
  };
}

describe("parseBrandTemplates", () => {
  it("accepts a complete file", () => {
    const templates = parseBrandTemplates(valid(), "brand.json");
    expect(templates.hooks).toEqual(["Hook."]);
    expect(templates.hashtags.max).toBe(4);
  });

  it("rejects an empty hook pool", () => {
    expect(() => parseBrandTemplates({ ...valid(), hooks: [] }, "brand.json")).toThrow(
      "brand.json.hooks must be a non-empty array of strings."
    );
  });

  it("rejects a hook x cta grid sharing a factor with the variant stride", () => {
    const raw = {
      ...valid(),
      hooks: ["H1.", "H2.", "H3.", "H4.", "H5.", "H6.", "H7."],
      ctas: ["C1.", "C2."],
    };
    expect(() => parseBrandTemplates(raw, "brand.json")).toThrow(
      "brand.json: 7 hooks x 2 ctas gives a grid of 14, which must not be a multiple of 7."
    );
  });

  it("accepts a grid coprime with the variant stride", () => {
    const raw = { ...valid(), hooks: ["H1.", "H2.", "H3."], ctas: ["C1.", "C2."] };
    expect(parseBrandTemplates(raw, "brand.json").hooks).toHaveLength(3);
  });

  it("reads an optional summary block", () => {
    expect(parseBrandTemplates(valid(), "brand.json").summary).toBeUndefined();
    const raw = {
      ...valid(),
      summary: { framePrefix: "Datos:", neutralStarts: ["El"], factWidth: 120 },
    };
    expect(parseBrandTemplates(raw, "brand.json").summary).toEqual({
      framePrefix: "Datos:",
      neutralStarts: ["el"],
      factWidth: 120,
    });
    expect(() =>
      parseBrandTemplates({ ...valid(), summary: { framePrefix: "Datos:", neutralStarts: [] } }, "brand.json")
    ).toThrow("brand.json.summary.factWidth must be a positive integer.");
  });

  it("rejects min above max", () => {
    const raw = { ...valid(), hashtags: { ...validHashtags(), min: 5, max: 4 } };
    expect(() => parseBrandTemplates(raw, "brand.json")).toThrow(ConfigError);
  });

  it("rejects a filler prefix without #", () => {
    const raw = { ...valid(), hashtags: { ...validHashtags(), fillerPrefix: "f" } };
    expect(() => parseBrandTemplates(raw, "brand.json")).toThrow(
      'brand.json.hashtags.fillerPrefix must start with "#".'
    );
  });
});

describe("loadBrandTemplates", () => {
  it("loads the shipped pools", () => {
    const templates = loadBrandTemplates("althara");
    expect(templates.hooks).toHaveLength(4);
    expect(templates.ctas).toHaveLength(3);
  });

  it("fails on an unknown brand", () => {
    expect(() => loadBrandTemplates("nobody")).toThrow(ConfigError);
  });
});
