import * as fs from "fs";
import { ConfigError } from "../lib/errors";
import { dataPath } from "../lib/paths";
import { VARIANT_STRIDE } from "../lib/seed";
import { isRecord } from "../lib/taxonomy";
import type { BrandTemplates, HashtagSpec, SummarySpec } from "./types";

function stringList(value: unknown, label: string, allowEmpty = false): readonly string[] {
  if (!Array.isArray(value) || (!allowEmpty && value.length === 0)) {
    throw new ConfigError(`${label} must be a non-empty array of strings.`);
  }
  const out: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string" || entry.trim().length === 0) {
      throw new ConfigError(`${label} must contain only non-empty strings.`);
    }
    out.push(entry);
  }
  return Object.freeze(out);
}

function stringMap<T>(
  value: unknown,
  label: string,
  read: (entry: unknown, key: string) => T
): Readonly<Record<string, T>> {
  if (!isRecord(value)) {
    throw new ConfigError(`${label} must be an object.`);
  }
  const out: Record<string, T> = {};
  for (const [key, entry] of Object.entries(value)) {
    out[key] = read(entry, key);
  }
  return Object.freeze(out);
}

function positiveInt(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${label} must be a positive integer.`);
  }
  return value;
}

function parseHashtags(raw: unknown, label: string): HashtagSpec {
  if (!isRecord(raw)) {
    throw new ConfigError(`${label} must be an object.`);
  }
  const min = positiveInt(raw.min, `${label}.min`);
  const max = positiveInt(raw.max, `${label}.max`);
  if (min > max) {
    throw new ConfigError(`${label}: min (${min}) exceeds max (${max}).`);
  }
  const base = stringList(raw.base, `${label}.base`);
  if (base.length > max) {
    throw new ConfigError(`${label}: more base tags than max allows.`);
  }
  if (typeof raw.fillerPrefix !== "string" || !raw.fillerPrefix.startsWith("#")) {
    throw new ConfigError(`${label}.fillerPrefix must start with "#".`);
  }
  return Object.freeze({
    base,
    byCategory: stringMap(raw.byCategory, `${label}.byCategory`, (entry, key) =>
      stringList(entry, `${label}.byCategory.${key}`)
    ),
    defaultCategory: stringList(raw.defaultCategory, `${label}.defaultCategory`),
    extras: stringList(raw.extras, `${label}.extras`),
    fillerPrefix: raw.fillerPrefix,
    min,
    max,
  });
}

function parseSummary(raw: unknown, label: string): SummarySpec | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) {
    throw new ConfigError(`${label} must be an object.`);
  }
  if (typeof raw.framePrefix !== "string" || !raw.framePrefix.trim()) {
    throw new ConfigError(`${label}.framePrefix must be a non-empty string.`);
  }
  return Object.freeze({
    framePrefix: raw.framePrefix,
    neutralStarts: stringList(raw.neutralStarts, `${label}.neutralStarts`, true).map((w) =>
      w.toLowerCase()
    ),
    factWidth: positiveInt(raw.factWidth, `${label}.factWidth`),
  });
}

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b);
}

export function parseBrandTemplates(raw: unknown, label: string): BrandTemplates {
  if (!isRecord(raw)) {
    throw new ConfigError(`${label}: expected an object.`);
  }
  if (typeof raw.defaultReading !== "string" || !raw.defaultReading.trim()) {
    throw new ConfigError(`${label}.defaultReading must be a non-empty string.`);
  }
  const hooks = stringList(raw.hooks, `${label}.hooks`);
  const ctas = stringList(raw.ctas, `${label}.ctas`);
  // Variant seeds step by VARIANT_STRIDE; a shared factor would revisit cells.
  const grid = hooks.length * ctas.length;
  if (gcd(grid, VARIANT_STRIDE) !== 1) {
    throw new ConfigError(
      `${label}: ${hooks.length} hooks x ${ctas.length} ctas gives a grid of ${grid}, ` +
        `which must not be a multiple of ${VARIANT_STRIDE}.`
    );
  }
  return Object.freeze({
    hooks,
    ctas,
    closers: stringList(raw.closers, `${label}.closers`),
    readings: stringMap(raw.readings, `${label}.readings`, (entry, key) => {
      if (typeof entry !== "string" || !entry.trim()) {
        throw new ConfigError(`${label}.readings.${key} must be a non-empty string.`);
      }
      return entry;
    }),
    defaultReading: raw.defaultReading,
    hashtags: parseHashtags(raw.hashtags, `${label}.hashtags`),
    summary: parseSummary(raw.summary, `${label}.summary`),
  });
}

const cache = new Map<string, BrandTemplates>();

export function loadBrandTemplates(brand: string): BrandTemplates {
  const cached = cache.get(brand);
  if (cached) return cached;

  const filePath = dataPath("brands", `${brand}.json`);
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Brand templates not found: ${filePath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${(err as Error).message}`);
  }
  const templates = parseBrandTemplates(raw, filePath);
  cache.set(brand, templates);
  return templates;
}
