import * as fs from "fs";
import { DOMAINS, type FeedSource } from "../contracts";
import { ConfigError } from "../lib/errors";
import { isMember, isRecord } from "../lib/taxonomy";

function requireString(value: unknown, label: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigError(`${label} must be a non-empty string.`);
  }
  return value.trim();
}

export function parseSources(raw: unknown, label: string): FeedSource[] {
  if (!isRecord(raw) || !Array.isArray(raw.sources)) {
    throw new ConfigError(`${label}: expected { "sources": [...] }.`);
  }
  const names = new Set<string>();
  return raw.sources.map((entry: unknown, i) => {
    const where = `${label} sources[${i}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(`${where} must be an object.`);
    }
    const name = requireString(entry.name, `${where}.name`);
    if (names.has(name)) {
      throw new ConfigError(`${where}: duplicate source name "${name}".`);
    }
    names.add(name);

    const url = requireString(entry.url, `${where}.url`);
    if (!/^https?:\/\//i.test(url)) {
      throw new ConfigError(`${where}.url must be an http(s) URL.`);
    }
    const domain = requireString(entry.domain, `${where}.domain`);
    if (!isMember(DOMAINS, domain)) {
      throw new ConfigError(`${where}.domain must be one of: ${DOMAINS.join(", ")}.`);
    }
    return { name, url, source: requireString(entry.source, `${where}.source`), domain };
  });
}

export function loadSources(filePath: string): FeedSource[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Sources file not found: ${filePath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${(err as Error).message}`);
  }
  return parseSources(raw, filePath);
}
