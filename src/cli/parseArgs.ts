import * as path from "path";
import { DOMAINS, DRAFT_STATUSES, type Domain, type DraftStatus } from "../contracts";

// --- CLI Arg Types ---

export interface IngestArgs {
  command: "ingest";
  domain?: Domain;
  limit?: number;
  /** Store brand summaries for pending items after ingesting. */
  adapt: boolean;
}

export interface ListArgs {
  command: "list";
  domain?: Domain;
  status?: DraftStatus;
}

export interface GenerateArgs {
  command: "generate";
  newsId: number;
  tone?: string;
}

export interface VariantsArgs {
  command: "variants";
  newsId: number;
  count: number;
  tone?: string;
}

export interface ShowArgs {
  command: "show";
  draftId: number;
}

export interface StatusArgs {
  command: "status";
  draftId: number;
  status: DraftStatus;
}

export interface RenderArgs {
  command: "render";
  draftId: number;
  outDir: string;
}

export interface EditArgs {
  command: "edit";
  draftId: number;
  hook?: string;
  caption?: string;
  cta?: string;
  sourceLine?: string;
  disclaimer?: string;
  tone?: string;
  language?: string;
  hashtags?: string[];
  /** 0-based slide position to new body. */
  slideBodies: Map<number, string>;
  /** A string sets the notes, null clears them. */
  editorNotes?: string | null;
}

export interface AdaptArgs {
  command: "adapt";
  domain?: Domain;
}

export interface RecategorizeArgs {
  command: "recategorize";
  domain?: Domain;
}

export interface PruneArgs {
  command: "prune";
  domain?: Domain;
  dryRun: boolean;
}

export interface HelpArgs {
  command: "help";
}

export type ParsedArgs =
  | IngestArgs
  | ListArgs
  | GenerateArgs
  | VariantsArgs
  | ShowArgs
  | StatusArgs
  | RenderArgs
  | EditArgs
  | AdaptArgs
  | RecategorizeArgs
  | PruneArgs
  | HelpArgs;

// --- Constants ---

export const MAX_VARIANTS_PER_REQUEST = 10;

export const USAGE = [
  "Usage:",
  "  newsdeck ingest [--domain real_estate|tech] [--limit N] [--adapt]",
  "  newsdeck list [--domain D] [--status DRAFT|NEEDS_REVIEW|APPROVED|PUBLISHED]",
  "  newsdeck generate <news_id> [--tone T]",
  `  newsdeck variants <news_id> --count N (1-${MAX_VARIANTS_PER_REQUEST}) [--tone T]`,
  "  newsdeck show <draft_id>",
  "  newsdeck status <draft_id> <STATUS>",
  "  newsdeck render <draft_id> [--out DIR]",
  "  newsdeck edit <draft_id> [--hook T] [--caption T] [--cta T] [--slide1|--slide2|--slide3 T]",
  "                [--hashtags \"#a #b\"] [--source-line T] [--disclaimer T] [--tone T]",
  "                [--language L] [--notes T | --clear-notes]",
  "  newsdeck adapt [--domain D]",
  "  newsdeck recategorize [--domain D]",
  "  newsdeck prune [--domain D] [--dry-run]",
].join("\n");

/** Bad command line; the CLI prints it with the usage text. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

// --- Value parsing ---

function parseId(value: string | undefined, what: string): number {
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`'${what}' requires an id.`);
  }
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new UsageError(`Invalid id "${value}". Must be a positive integer.`);
  }
  return n;
}

function parseDomainFlag(value: string): Domain {
  const domain = DOMAINS.find((d) => d === value);
  if (!domain) {
    throw new UsageError(`--domain must be one of: ${DOMAINS.join(", ")}`);
  }
  return domain;
}

function parseStatus(value: string, flag: string): DraftStatus {
  const status = DRAFT_STATUSES.find((s) => s === value.toUpperCase());
  if (!status) {
    throw new UsageError(`${flag} must be one of: ${DRAFT_STATUSES.join(", ")}`);
  }
  return status;
}

function parseCount(value: string, flag: string, max?: number): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || (max !== undefined && n > max)) {
    const range = max !== undefined ? `between 1 and ${max}` : "a positive integer";
    throw new UsageError(`${flag} must be ${range}.`);
  }
  return n;
}

/**
 * Walks `--flag value` pairs and bare `--switch`es.
 * `valued` and `switches` list the accepted names.
 */
function readFlags(
  args: string[],
  valued: readonly string[],
  switches: readonly string[] = []
): { values: Map<string, string>; on: Set<string> } {
  const values = new Map<string, string>();
  const on = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valued.includes(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`${arg} requires a value`);
      }
      values.set(arg, value);
      i++;
    } else if (switches.includes(arg)) {
      on.add(arg);
    } else {
      throw new UsageError(`Unknown argument "${arg}"`);
    }
  }
  return { values, on };
}

function optional<T>(value: string | undefined, parse: (v: string) => T): T | undefined {
  return value === undefined ? undefined : parse(value);
}

const EDIT_TEXT_FLAGS = {
  "--hook": "hook",
  "--caption": "caption",
  "--cta": "cta",
  "--source-line": "sourceLine",
  "--disclaimer": "disclaimer",
  "--tone": "tone",
  "--language": "language",
} as const;

const SLIDE_FLAGS = ["--slide1", "--slide2", "--slide3"] as const;

function parseHashtagList(value: string): string[] {
  return value.split(/[\s,]+/).filter(Boolean);
}

function parseEdit(rest: string[]): EditArgs {
  const draftId = parseId(rest[0], "edit");
  const { values, on } = readFlags(
    rest.slice(1),
    [...Object.keys(EDIT_TEXT_FLAGS), ...SLIDE_FLAGS, "--hashtags", "--notes"],
    ["--clear-notes"]
  );

  const args: EditArgs = { command: "edit", draftId, slideBodies: new Map() };
  for (const [flag, field] of Object.entries(EDIT_TEXT_FLAGS)) {
    const value = values.get(flag);
    if (value !== undefined) args[field] = value;
  }
  SLIDE_FLAGS.forEach((flag, index) => {
    const value = values.get(flag);
    if (value !== undefined) args.slideBodies.set(index, value);
  });
  args.hashtags = optional(values.get("--hashtags"), parseHashtagList);

  const notes = values.get("--notes");
  if (notes !== undefined && on.has("--clear-notes")) {
    throw new UsageError("Use either --notes or --clear-notes, not both.");
  }
  if (notes !== undefined) args.editorNotes = notes;
  if (on.has("--clear-notes")) args.editorNotes = null;

  if (values.size === 0 && on.size === 0) {
    throw new UsageError("'edit' requires at least one field to change.");
  }
  return args;
}

// --- CLI Parsing ---

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);

  if (args.length === 0) {
    throw new UsageError("No command or arguments provided.");
  }

  const [command, ...rest] = args;

  switch (command) {
    case "help":
    case "--help":
    case "-h":
      return { command: "help" };

    case "ingest": {
      const { values, on } = readFlags(rest, ["--domain", "--limit"], ["--adapt"]);
      return {
        command: "ingest",
        domain: optional(values.get("--domain"), parseDomainFlag),
        limit: optional(values.get("--limit"), (v) => parseCount(v, "--limit")),
        adapt: on.has("--adapt"),
      };
    }

    case "list": {
      const { values } = readFlags(rest, ["--domain", "--status"]);
      return {
        command: "list",
        domain: optional(values.get("--domain"), parseDomainFlag),
        status: optional(values.get("--status"), (v) => parseStatus(v, "--status")),
      };
    }

    case "generate": {
      const newsId = parseId(rest[0], "generate");
      const { values } = readFlags(rest.slice(1), ["--tone"]);
      return { command: "generate", newsId, tone: values.get("--tone") };
    }

    case "variants": {
      const newsId = parseId(rest[0], "variants");
      const { values } = readFlags(rest.slice(1), ["--count", "--tone"]);
      const count = values.get("--count");
      if (count === undefined) {
        throw new UsageError("'variants' requires --count N.");
      }
      return {
        command: "variants",
        newsId,
        count: parseCount(count, "--count", MAX_VARIANTS_PER_REQUEST),
        tone: values.get("--tone"),
      };
    }

    case "show": {
      const draftId = parseId(rest[0], "show");
      readFlags(rest.slice(1), []);
      return { command: "show", draftId };
    }

    case "status": {
      const draftId = parseId(rest[0], "status");
      if (rest[1] === undefined) {
        throw new UsageError("'status' requires a target status.");
      }
      readFlags(rest.slice(2), []);
      return { command: "status", draftId, status: parseStatus(rest[1], "Status") };
    }

    case "render": {
      const draftId = parseId(rest[0], "render");
      const { values } = readFlags(rest.slice(1), ["--out"]);
      const outDir = path.resolve(values.get("--out") ?? path.join("output", `draft-${draftId}`));
      return { command: "render", draftId, outDir };
    }

    case "edit":
      return parseEdit(rest);

    case "adapt": {
      const { values } = readFlags(rest, ["--domain"]);
      return { command: "adapt", domain: optional(values.get("--domain"), parseDomainFlag) };
    }

    case "recategorize": {
      const { values } = readFlags(rest, ["--domain"]);
      return {
        command: "recategorize",
        domain: optional(values.get("--domain"), parseDomainFlag),
      };
    }

    case "prune": {
      const { values, on } = readFlags(rest, ["--domain"], ["--dry-run"]);
      return {
        command: "prune",
        domain: optional(values.get("--domain"), parseDomainFlag),
        dryRun: on.has("--dry-run"),
      };
    }

    default:
      throw new UsageError(
        command.startsWith("--") ? `Unknown flag "${command}"` : `Unknown command "${command}"`
      );
  }
}
