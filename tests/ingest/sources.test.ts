import { describe, it, expect } from "vitest";
import { ConfigError } from "../../src/lib/errors";
import { dataPath } from "../../src/lib/paths";
import { loadSources, parseSources } from "../../src/ingest/sources";

const entry = {
  name: "Diario A",
  url: "https://example.com/a.xml",
  source: "Diario A",
  domain: "real_estate",
};

describe("parseSources", () => {
  it("accepts valid entries", () => {
    expect(parseSources({ sources: [entry] }, "sources.json")).toEqual([entry]);
  });

  it("rejects duplicate names", () => {
    expect(() => parseSources({ sources: [entry, entry] }, "sources.json")).toThrow(
      'sources.json sources[1]: duplicate source name "Diario A".'
    );
  });

  it("rejects a non-http url", () => {
    expect(() =>
      parseSources({ sources: [{ ...entry, url: "ftp://example.com/a" }] }, "sources.json")
    ).toThrow("sources.json sources[0].url must be an http(s) URL.");
  });

  it("rejects an unknown domain", () => {
    expect(() =>
      parseSources({ sources: [{ ...entry, domain: "sports" }] }, "sources.json")
    ).toThrow("sources.json sources[0].domain must be one of: real_estate, tech.");
  });

  it("rejects a file without a sources array", () => {
    expect(() => parseSources([], "sources.json")).toThrow(ConfigError);
  });
});

describe("loadSources", () => {
  it("loads the shipped configuration", () => {
    const sources = loadSources(dataPath("sources.json"));
    expect(sources.length).toBeGreaterThan(0);
    expect(sources.some((s) => s.domain === "real_estate")).toBe(true);
    expect(sources.some((s) => s.domain === "tech")).toBe(true);
  });

  it("fails on a missing file", () => {
    expect(() => loadSources(dataPath("missing.json"))).toThrow(ConfigError);
  });
});
