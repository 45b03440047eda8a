import type { DefaultKey, SectionKind } from "./sections.js";

export const LIBRARY_VERSION = 1;
export const DEFAULT_GENERATOR = "ai-vibrant-image-generator";

/** Raw image bytes. Two images are the same image when their bytes match. */
export interface PromptImage {
  id: string;
  data: Uint8Array;
}

/** Default text per section. Blank values are never stored. */
export type DefaultsMap = Partial<Record<DefaultKey, string>>;

/**
 * Name of the preset a field was filled from, per section. Display metadata
 * only; composition never reads it.
 */
export type PresetMarkers<K extends SectionKind = SectionKind> = Partial<Record<K, string>>;

export type CharacterSectionKind = Extract<SectionKind, "physicalDescription" | "outfit" | "pose">;
export type SceneWideSectionKind = Exclude<SectionKind, CharacterSectionKind>;

export interface Preset {
  id: string;
  kind: SectionKind;
  name: string;
  text: string;
}

export interface RelatedLink {
  id: string;
  title: string;
  url: string;
}

export interface PromptSections {
  physicalDescription?: string;
  outfit?: string;
  pose?: string;
  environment?: string;
  lighting?: string;
  styleModifiers?: string;
  technicalModifiers?: string;
  negativePrompt?: string;
}

export type PromptSectionField = keyof PromptSections;

export interface PromptText extends PromptSections {
  /** Prompt-only free text; there is no default for it at any scope. */
  additionalInfo?: string;
}

export interface Prompt extends PromptText {
  id: string;
  title: string;
  presetMarkers: PresetMarkers;
  images: PromptImage[];
}

export interface SceneCharacterText {
  physicalDescription?: string;
  outfit?: string;
  pose?: string;
  additionalInfo?: string;
}

export interface SceneCharacterSettings extends SceneCharacterText {
  /** Character prompt these settings were loaded from, if any. */
  sourcePromptId?: string;
  presetMarkers: PresetMarkers<CharacterSectionKind>;
}

export interface SceneWideText {
  environment?: string;
  lighting?: string;
  styleModifiers?: string;
  technicalModifiers?: string;
  negativePrompt?: string;
  additionalInfo?: string;
}

export type SceneWideField = Exclude<keyof SceneWideText, "additionalInfo">;

export interface ScenePromptText extends SceneWideText {
  /** Keyed by character id; characters without an entry compose as their name. */
  characterSettings: Readonly<Record<string, SceneCharacterText>>;
}

export interface ScenePrompt extends SceneWideText {
  id: string;
  title: string;
  characterSettings: Record<string, SceneCharacterSettings>;
  presetMarkers: PresetMarkers<SceneWideSectionKind>;
  images: PromptImage[];
}

export interface Character {
  id: string;
  name: string;
  bio: string;
  notes: string;
  prompts: Prompt[];
  profileImage?: Uint8Array;
  standaloneImages: PromptImage[];
  links: RelatedLink[];
  characterDefaults: DefaultsMap;
  generatorOverride?: string;
  themeOverride?: string;
}

export interface Scene {
  id: string;
  name: string;
  description: string;
  notes: string;
  /** Member order is the scene's own and is kept as written. */
  characterIds: string[];
  prompts: ScenePrompt[];
  profileImage?: Uint8Array;
  standaloneImages: PromptImage[];
  links: RelatedLink[];
  sceneDefaults: DefaultsMap;
  generatorOverride?: string;
  themeOverride?: string;
}

export interface Library {
  version: typeof LIBRARY_VERSION;
  characters: Character[];
  scenes: Scene[];
  presets: Preset[];
  globalDefaults: DefaultsMap;
  defaultGenerator: string;
}
