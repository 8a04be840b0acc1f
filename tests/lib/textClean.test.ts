import { describe, it, expect } from "vitest";
import {
  cleanText,
  collapseWhitespace,
  decodeBytes,
  decodeEntities,
  repairMojibake,
} from "../../src/lib/textClean";

describe("cleanText", () => {
  it("returns empty string for missing input", () => {
    expect(cleanText(null)).toBe("");
    expect(cleanText(undefined)).toBe("");
    expect(cleanText("")).toBe("");
    expect(cleanText("   \n\t ")).toBe("");
  });

  it("strips tags and decodes entities", () => {
    expect(cleanText("<p>Hola &amp; adi&oacute;s</p>")).toBe("Hola & adiós");
  });

  it("collapses whitespace runs and trims", () => {
    expect(cleanText("  El   precio\n\nsube\t hoy  ")).toBe("El precio sube hoy");
  });

  it("repairs UTF-8 read as Latin-1", () => {
    expect(cleanText("La participaciÃ³n del Banco de EspaÃ±a")).toBe(
      "La participación del Banco de España"
    );
  });

  it("leaves correct Spanish quotations unchanged", () => {
    expect(cleanText("El «SÍ» del Gobierno")).toBe("El «SÍ» del Gobierno");
  });

  it("decodes UTF-8 bytes", () => {
    expect(cleanText(new TextEncoder().encode("<b>café</b> y más"))).toBe("café y más");
  });

  it("falls back to latin1 for invalid UTF-8 bytes", () => {
    expect(cleanText(Uint8Array.from([0x63, 0x61, 0x66, 0xe9]))).toBe("café");
  });
});

describe("decodeEntities", () => {
  it("decodes decimal and hex references", () => {
    expect(decodeEntities("caf&#233; caf&#x00E9; caf&#xe9;")).toBe("café café café");
  });

  it("keeps unknown named entities", () => {
    expect(decodeEntities("a &foo; b")).toBe("a &foo; b");
  });

  it("keeps out-of-range code points", () => {
    expect(decodeEntities("&#0; &#x110000;")).toBe("&#0; &#x110000;");
  });
});

describe("decodeBytes", () => {
  it("never throws on arbitrary bytes", () => {
    expect(decodeBytes(Uint8Array.from([0xff, 0xfe, 0x41]))).toBe("ÿþA");
  });
});

describe("repairMojibake", () => {
  it("leaves correct text untouched", () => {
    expect(repairMojibake("Año récord en vivienda")).toBe("Año récord en vivienda");
  });

  it("keeps an accented capital before closing quotes", () => {
    expect(repairMojibake("El «SÍ» del Gobierno")).toBe("El «SÍ» del Gobierno");
    expect(repairMojibake("«CONSTRUCCIÓN»")).toBe("«CONSTRUCCIÓN»");
    expect(repairMojibake("“ADMINISTRACIÓN”")).toBe("“ADMINISTRACIÓN”");
  });

  it("keeps an accented vowel before an ellipsis and a quote", () => {
    expect(repairMojibake("“Aumentará…”")).toBe("“Aumentará…”");
  });

  it("repairs three-byte sequences", () => {
    // "€" encoded as UTF-8 (E2 82 AC) and read as Windows-1252
    expect(repairMojibake("100 â‚¬")).toBe("100 €");
  });
});

describe("collapseWhitespace", () => {
  it("turns non-breaking spaces into plain spaces", () => {
    expect(collapseWhitespace("7,1\u00a0%\u00a0\u00a0anual")).toBe("7,1 % anual");
  });
});
