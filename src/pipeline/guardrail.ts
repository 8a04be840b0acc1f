import type { GuardrailConfig } from "../contracts";

export interface GuardrailInput {
  summary?: string | null;
  url?: string | null;
}

/**
 * Deny/allow keyword gate deciding whether an item is in-domain.
 *
 * Keywords are matched as lower-case substrings of title, summary and url.
 * A deny hit always rejects; in strict mode an allow hit is also required.
 */
export function passesGuardrails(
  title: string,
  config: GuardrailConfig,
  input: GuardrailInput = {}
): boolean {
  if (!title) return false;

  const haystack = `${title} ${input.summary ?? ""} ${input.url ?? ""}`.toLowerCase();

  if (config.denyKeywords.some((kw) => haystack.includes(kw))) {
    return false;
  }
  if (
    config.strictRequireAllow &&
    !config.allowKeywords.some((kw) => haystack.includes(kw))
  ) {
    return false;
  }
  return true;
}
