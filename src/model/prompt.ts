import { randomUUID } from "node:crypto";

import type { SectionKind } from "./sections.js";
import { presentText } from "../shared/text.js";
import type { Prompt, PromptSectionField, PromptSections } from "./types.js";

const PROMPT_FIELD_BY_KIND: Record<SectionKind, PromptSectionField> = {
  physicalDescription: "physicalDescription",
  outfit: "outfit",
  pose: "pose",
  environment: "environment",
  lighting: "lighting",
  style: "styleModifiers",
  technical: "technicalModifiers",
  negative: "negativePrompt",
};

export const NEW_PROMPT_TITLE = "New Prompt";

export type IdFactory = () => string;

export const defaultIdFactory: IdFactory = () => randomUUID();

export function promptFieldFor(kind: SectionKind): PromptSectionField {
  return PROMPT_FIELD_BY_KIND[kind];
}

export function promptContent(prompt: PromptSections, kind: SectionKind): string | undefined {
  return prompt[PROMPT_FIELD_BY_KIND[kind]];
}

export function createCharacterPrompt(title: string, createId: IdFactory = defaultIdFactory): Prompt {
  return {
    id: createId(),
    title,
    presetMarkers: {},
    images: [],
  };
}

/** Copies text and preset markers under a new id. Images stay with the original. */
export function duplicatePrompt(
  prompt: Prompt,
  title: string,
  createId: IdFactory = defaultIdFactory,
): Prompt {
  return {
    ...prompt,
    id: createId(),
    title,
    presetMarkers: { ...prompt.presetMarkers },
    images: [],
  };
}

/**
 * Stores the text of one section. Blank text clears the field. The preset
 * marker is set when the text came from a named preset and dropped otherwise.
 */
export function setPromptSection(
  prompt: Prompt,
  kind: SectionKind,
  text: string,
  presetName?: string,
): Prompt {
  const field = PROMPT_FIELD_BY_KIND[kind];
  const next: Prompt = { ...prompt, presetMarkers: { ...prompt.presetMarkers } };

  if (presentText(text) === undefined) {
    delete next[field];
    delete next.presetMarkers[kind];
    return next;
  }

  next[field] = text;
  if (presetName === undefined) {
    delete next.presetMarkers[kind];
  } else {
    next.presetMarkers[kind] = presetName;
  }
  return next;
}
