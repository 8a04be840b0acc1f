/**
 * Plain-text extraction for feed and article markup.
 *
 * Every ingestor and the draft composer go through cleanText(); it never
 * throws and always returns single-spaced, trimmed text.
 */

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  iexcl: "¡",
  iquest: "¿",
  laquo: "«",
  raquo: "»",
  ordf: "ª",
  ordm: "º",
  deg: "°",
  middot: "·",
  copy: "©",
  reg: "®",
  trade: "™",
  euro: "€",
  hellip: "…",
  ndash: "–",
  mdash: "—",
  lsquo: "‘",
  rsquo: "’",
  ldquo: "“",
  rdquo: "”",
  aacute: "á",
  eacute: "é",
  iacute: "í",
  oacute: "ó",
  uacute: "ú",
  Aacute: "Á",
  Eacute: "É",
  Iacute: "Í",
  Oacute: "Ó",
  Uacute: "Ú",
  ntilde: "ñ",
  Ntilde: "Ñ",
  uuml: "ü",
  Uuml: "Ü",
  ccedil: "ç",
};

/**
 * Windows-1252 characters that stand in for bytes 0x80-0x9F when UTF-8 text
 * was decoded with the wrong code page.
 */
const CP1252_BYTES: Readonly<Record<string, number>> = {
  "€": 0x80,
  "‚": 0x82,
  "„": 0x84,
  "…": 0x85,
  "‘": 0x91,
  "’": 0x92,
  "“": 0x93,
  "”": 0x94,
  "–": 0x96,
  "—": 0x97,
  "™": 0x99,
  "œ": 0x9c,
};

const CONT = "[\\u0080-\\u00BF€‚„…‘’“”–—™œ]";
const MOJIBAKE_PATTERN = new RegExp(
  `[\\u00C2-\\u00DF]${CONT}|[\\u00E0-\\u00EF]${CONT}{2}|[\\u00F0-\\u00F4]${CONT}{3}`,
  "g"
);

/**
 * Decode raw bytes: strict UTF-8 first, latin1 when that fails.
 * latin1 maps every byte, so this never throws.
 */
export function decodeBytes(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return Buffer.from(bytes).toString("latin1");
  }
}

/** Decode named, decimal and hex character references. Unknown names are kept. */
export function decodeEntities(text: string): string {
  return text.replace(
    /&(#x[0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g,
    (match: string, ref: string) => {
      if (ref.startsWith("#")) {
        const isHex = ref[1] === "x" || ref[1] === "X";
        const code = parseInt(ref.slice(isHex ? 2 : 1), isHex ? 16 : 10);
        if (!Number.isFinite(code) || code <= 0 || code > 0x10ffff) {
          return match;
        }
        return String.fromCodePoint(code);
      }
      return NAMED_ENTITIES[ref] ?? match;
    }
  );
}

/**
 * Characters a repaired sequence may decode to: Latin-1 letters and symbols,
 * Latin Extended-A, and general punctuation through the euro sign. Anything
 * else means the input was correct text that only looked damaged.
 */
function isPlausibleRepair(decoded: string): boolean {
  const code = decoded.codePointAt(0) ?? 0;
  return (code >= 0xa0 && code <= 0x17f) || (code >= 0x2010 && code <= 0x20ac);
}

function toByte(ch: string): number | null {
  const code = ch.charCodeAt(0);
  if (code <= 0xff) return code;
  return CP1252_BYTES[ch] ?? null;
}

/**
 * Best-effort repair of UTF-8 text that was read as Latin-1/Windows-1252
 * ("participaciÃ³n" -> "participación"). Sequences that do not decode as
 * valid UTF-8, or decode outside the Latin and punctuation ranges, are left
 * as they are ("«SÍ»" stays "«SÍ»").
 */
export function repairMojibake(text: string): string {
  return text.replace(MOJIBAKE_PATTERN, (seq: string) => {
    const bytes: number[] = [];
    for (const ch of seq) {
      const b = toByte(ch);
      if (b === null) return seq;
      bytes.push(b);
    }
    try {
      const decoded = new TextDecoder("utf-8", { fatal: true }).decode(
        Uint8Array.from(bytes)
      );
      return isPlausibleRepair(decoded) ? decoded : seq;
    } catch {
      return seq;
    }
  });
}

export function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, "");
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Markup, entities and encoding damage in; plain single-spaced text out.
 * Empty or missing input yields "".
 */
export function cleanText(input: string | Uint8Array | null | undefined): string {
  if (input === null || input === undefined) return "";
  let text = typeof input === "string" ? input : decodeBytes(input);
  if (!text) return "";

  text = decodeEntities(text);
  text = stripTags(text);
  text = repairMojibake(text);
  return collapseWhitespace(text);
}
