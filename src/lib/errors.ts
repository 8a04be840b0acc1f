/** Invalid environment or configuration file. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A classification table that cannot be used (empty, unknown fallback, bad category). */
export class RuleTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RuleTableError";
  }
}

export class NewsNotFoundError extends Error {
  constructor(public readonly newsId: number) {
    super(`News item ${newsId} not found.`);
    this.name = "NewsNotFoundError";
  }
}

export class DraftNotFoundError extends Error {
  constructor(public readonly draftId: number) {
    super(`Draft ${draftId} not found.`);
    this.name = "DraftNotFoundError";
  }
}

export class InvalidStatusTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Cannot move a draft from ${from} to ${to}.`);
    this.name = "InvalidStatusTransitionError";
  }
}

export class InvalidDraftEditError extends Error {
  constructor(
    public readonly draftId: number,
    reason: string
  ) {
    super(`Cannot edit draft ${draftId}: ${reason}`);
    this.name = "InvalidDraftEditError";
  }
}
