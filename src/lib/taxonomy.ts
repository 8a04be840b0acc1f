/**
 * Loading and validation of the keyword tables under data/.
 *
 * Tables are immutable values read once per process and handed to the
 * classifiers and guardrails explicitly.
 */

import * as fs from "fs";
import {
  REAL_ESTATE_CATEGORIES,
  TECH_CATEGORIES,
  type Category,
  type ClassificationRule,
  type Domain,
  type GuardrailConfig,
  type RealEstateCategory,
  type RuleTable,
  type TechCategory,
} from "../contracts";
import {
  createClassifier,
  type CategoryClassifier,
  type ClassifierStrategy,
} from "../pipeline/classify";
import { ConfigError, RuleTableError } from "./errors";
import { dataPath } from "./paths";

// --- Narrowing ---

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isMember<C extends string>(allowed: readonly C[], value: string): value is C {
  return allowed.some((c) => c === value);
}

export function isRealEstateCategory(value: string): value is RealEstateCategory {
  return isMember(REAL_ESTATE_CATEGORIES, value);
}

export function isTechCategory(value: string): value is TechCategory {
  return isMember(TECH_CATEGORIES, value);
}

export function categoriesFor(domain: Domain): readonly Category[] {
  switch (domain) {
    case "real_estate":
      return REAL_ESTATE_CATEGORIES;
    case "tech":
      return TECH_CATEGORIES;
  }
}

function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`File not found: ${filePath}`);
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${(err as Error).message}`);
  }
}

/** Keywords are matched lower-case; surrounding spaces are significant and kept. */
function parseKeywords(value: unknown, label: string): string[] {
  if (!Array.isArray(value)) {
    throw new RuleTableError(`${label}: keywords must be an array.`);
  }
  return value.map((kw, i) => {
    if (typeof kw !== "string" || kw.trim().length === 0) {
      throw new RuleTableError(`${label}: keyword #${i} must be a non-empty string.`);
    }
    return kw.toLowerCase();
  });
}

// --- Rule tables ---

export interface LoadedRuleTable<C extends string> {
  strategy: ClassifierStrategy;
  table: RuleTable<C>;
}

export function parseRuleTable<C extends string>(
  raw: unknown,
  allowed: readonly C[],
  label: string
): LoadedRuleTable<C> {
  if (!isRecord(raw)) {
    throw new RuleTableError(`${label}: expected an object.`);
  }
  const { strategy, fallback, rules } = raw;

  if (strategy !== "priority" && strategy !== "hint-count") {
    throw new RuleTableError(`${label}: strategy must be "priority" or "hint-count".`);
  }
  if (typeof fallback !== "string" || !isMember(allowed, fallback)) {
    throw new RuleTableError(`${label}: unknown fallback category "${String(fallback)}".`);
  }
  if (!Array.isArray(rules) || rules.length === 0) {
    throw new RuleTableError(`${label}: rules must be a non-empty array.`);
  }

  const parsed: ClassificationRule<C>[] = rules.map((rule, i) => {
    if (!isRecord(rule) || typeof rule.category !== "string") {
      throw new RuleTableError(`${label}: rule #${i} needs a category.`);
    }
    const category = rule.category;
    if (!isMember(allowed, category)) {
      throw new RuleTableError(`${label}: rule #${i} has unknown category "${category}".`);
    }
    return {
      category,
      keywords: Object.freeze(parseKeywords(rule.keywords, `${label} ${category}`)),
    };
  });

  return {
    strategy,
    table: Object.freeze({ fallback, rules: Object.freeze(parsed) }),
  };
}

const classifierCache = new Map<Domain, CategoryClassifier<Category>>();

/** Classifier for a domain, built from data/taxonomy/<domain>.json. */
export function loadClassifier(domain: Domain): CategoryClassifier<Category> {
  const cached = classifierCache.get(domain);
  if (cached) return cached;

  const filePath = dataPath("taxonomy", `${domain}.json`);
  const { strategy, table } = parseRuleTable(readJson(filePath), categoriesFor(domain), filePath);
  const classifier = createClassifier(strategy, table);
  classifierCache.set(domain, classifier);
  return classifier;
}

// --- Guardrails ---

export function parseGuardrailConfig(raw: unknown, label: string): GuardrailConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${label}: expected an object.`);
  }
  if (typeof raw.strictRequireAllow !== "boolean") {
    throw new ConfigError(`${label}: strictRequireAllow must be a boolean.`);
  }
  return Object.freeze({
    denyKeywords: Object.freeze(parseKeywords(raw.denyKeywords, `${label} denyKeywords`)),
    allowKeywords: Object.freeze(parseKeywords(raw.allowKeywords, `${label} allowKeywords`)),
    strictRequireAllow: raw.strictRequireAllow,
  });
}

const guardrailCache = new Map<Domain, GuardrailConfig>();

export function loadGuardrailConfig(domain: Domain): GuardrailConfig {
  const cached = guardrailCache.get(domain);
  if (cached) return cached;

  const filePath = dataPath("guardrails", `${domain}.json`);
  const config = parseGuardrailConfig(readJson(filePath), filePath);
  guardrailCache.set(domain, config);
  return config;
}
