import { selectIndex } from "../lib/seed";
import type { HashtagSpec } from "./types";

/**
 * Base tags, then the category's tags, then extras rotated by seed until
 * `max`; numbered filler tags top the list up to `min`. No duplicates.
 */
export function buildHashtags(spec: HashtagSpec, category: string, seed: number): string[] {
  const tags: string[] = [];
  const add = (tag: string): void => {
    if (tags.length < spec.max && !tags.includes(tag)) tags.push(tag);
  };

  spec.base.forEach(add);
  (spec.byCategory[category] ?? spec.defaultCategory).forEach(add);
  for (let i = 0; i < spec.extras.length && tags.length < spec.max; i++) {
    add(spec.extras[selectIndex(seed + i, spec.extras.length)]);
  }

  for (let k = 0; tags.length < spec.min && k < 10; k++) {
    add(`${spec.fillerPrefix}${selectIndex(seed + k, 10)}`);
  }
  return tags;
}
