import { resolveValue } from "./resolve.js";
import { promptContent } from "../model/prompt.js";
import { defaultKeyFor, sectionLabel, type SectionKind } from "../model/sections.js";
import type { Character, DefaultsMap, PromptText } from "../model/types.js";
import { presentText } from "../shared/text.js";

export const NEGATIVE_PROMPT_PREFIX = "Negative prompt: ";
export const ADDITIONAL_INFO_LABEL = "Additional Information";

const BLOCK_SECTIONS: readonly SectionKind[] = [
  "physicalDescription",
  "outfit",
  "pose",
  "environment",
  "lighting",
  "style",
  "technical",
];

export type ComposableCharacter = Pick<Character, "name" | "characterDefaults">;

/**
 * Resolves every section for one character and renders the labeled prompt.
 *
 * Order: Name, the seven block sections, the inline negative line, then the
 * prompt's additional information. Sections without a value are left out and
 * the rest are separated by a blank line.
 */
export function composeSingleCharacterPrompt(
  character: ComposableCharacter,
  prompt: PromptText,
  globalDefaults: DefaultsMap,
): string {
  const output: string[] = [];

  const name = presentText(character.name);
  if (name) {
    output.push(labeledBlock("Name", name));
  }

  for (const kind of BLOCK_SECTIONS) {
    const value = resolveSection(kind, character, prompt, globalDefaults);
    if (value) {
      output.push(labeledBlock(sectionLabel(kind), value));
    }
  }

  const negative = resolveSection("negative", character, prompt, globalDefaults);
  if (negative) {
    output.push(negativeLine(negative));
  }

  const additionalInfo = presentText(prompt.additionalInfo);
  if (additionalInfo) {
    output.push(labeledBlock(ADDITIONAL_INFO_LABEL, additionalInfo));
  }

  return output.join("\n\n");
}

export function resolveSection(
  kind: SectionKind,
  character: ComposableCharacter,
  prompt: PromptText,
  globalDefaults: DefaultsMap,
): string | undefined {
  const key = defaultKeyFor(kind);
  return resolveValue(promptContent(prompt, kind), character.characterDefaults[key], globalDefaults[key]);
}

function labeledBlock(label: string, value: string): string {
  return `${label}:\n${value}`;
}

function negativeLine(value: string): string {
  return value.startsWith(NEGATIVE_PROMPT_PREFIX) ? value : `${NEGATIVE_PROMPT_PREFIX}${value}`;
}
