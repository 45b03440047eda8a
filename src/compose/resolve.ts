import { presentText } from "../shared/text.js";

/**
 * First present value among the prompt's own text, the character or scene
 * default, and the global default. Presence is decided per layer, never by
 * comparing values, so a prompt value equal to a default still wins.
 */
export function resolveValue(
  promptValue: string | null | undefined,
  scopedDefault: string | null | undefined,
  globalDefault: string | null | undefined,
): string | undefined {
  return presentText(promptValue) ?? presentText(scopedDefault) ?? presentText(globalDefault);
}
