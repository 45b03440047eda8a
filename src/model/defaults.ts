import { DEFAULT_KEYS, type DefaultKey } from "./sections.js";
import type { DefaultsMap } from "./types.js";
import { resolveValue } from "../compose/resolve.js";
import { presentText } from "../shared/text.js";

/** Returns a copy with `key` set to the trimmed value, or removed when blank. */
export function setDefault(
  defaults: DefaultsMap,
  key: DefaultKey,
  value: string | null | undefined,
): DefaultsMap {
  const next: DefaultsMap = { ...defaults };
  const present = presentText(value);
  if (present === undefined) {
    delete next[key];
  } else {
    next[key] = present;
  }
  return next;
}

/** Drops blank entries and trims the rest, keeping key order stable. */
export function normalizeDefaults(defaults: DefaultsMap): DefaultsMap {
  const normalized: DefaultsMap = {};
  for (const key of DEFAULT_KEYS) {
    const present = presentText(defaults[key]);
    if (present !== undefined) {
      normalized[key] = present;
    }
  }
  return normalized;
}

export function effectiveDefault(
  key: DefaultKey,
  scopedDefaults: DefaultsMap,
  globalDefaults: DefaultsMap,
): string | undefined {
  return resolveValue(undefined, scopedDefaults[key], globalDefaults[key]);
}
