import { effectiveDefault } from "../model/defaults.js";
import { NEW_PROMPT_TITLE, defaultIdFactory, type IdFactory } from "../model/prompt.js";
import type { DefaultKey } from "../model/sections.js";
import type {
  DefaultsMap,
  Prompt,
  Scene,
  SceneCharacterSettings,
  ScenePrompt,
  SceneWideField,
} from "../model/types.js";

export const NEW_SCENE_PROMPT_TITLE = NEW_PROMPT_TITLE;

const SEEDED_FIELDS: ReadonlyArray<readonly [SceneWideField, DefaultKey]> = [
  ["environment", "environment"],
  ["lighting", "lighting"],
  ["styleModifiers", "style"],
  ["technicalModifiers", "technical"],
  ["negativePrompt", "negative"],
];

export type SeededSceneFields = Partial<Record<SceneWideField, string>>;

/**
 * Starting values for a new scene prompt: scene defaults first, then global
 * defaults. Keys with no present value are left out.
 */
export function seedScenePromptDefaults(
  scene: Pick<Scene, "sceneDefaults">,
  globalDefaults: DefaultsMap,
): SeededSceneFields {
  const seeded: SeededSceneFields = {};
  for (const [field, key] of SEEDED_FIELDS) {
    const value = effectiveDefault(key, scene.sceneDefaults, globalDefaults);
    if (value !== undefined) {
      seeded[field] = value;
    }
  }
  return seeded;
}

export interface CreateScenePromptOptions {
  title?: string;
  createId?: IdFactory;
}

export function createScenePrompt(
  scene: Pick<Scene, "sceneDefaults">,
  globalDefaults: DefaultsMap,
  options: CreateScenePromptOptions = {},
): ScenePrompt {
  const createId = options.createId ?? defaultIdFactory;
  return {
    id: createId(),
    title: options.title ?? NEW_SCENE_PROMPT_TITLE,
    ...seedScenePromptDefaults(scene, globalDefaults),
    characterSettings: {},
    presetMarkers: {},
    images: [],
  };
}

/** Copies text and per-character settings; images are not carried over. */
export function duplicateScenePrompt(
  prompt: ScenePrompt,
  title: string,
  createId: IdFactory = defaultIdFactory,
): ScenePrompt {
  const characterSettings: Record<string, SceneCharacterSettings> = {};
  for (const [characterId, settings] of Object.entries(prompt.characterSettings)) {
    characterSettings[characterId] = {
      ...settings,
      presetMarkers: { ...settings.presetMarkers },
    };
  }

  return {
    ...prompt,
    id: createId(),
    title,
    characterSettings,
    presetMarkers: { ...prompt.presetMarkers },
    images: [],
  };
}

/**
 * Fills one character's settings from one of that character's saved prompts
 * and records where they came from.
 */
export function loadCharacterSettingsFromPrompt(
  scenePrompt: ScenePrompt,
  characterId: string,
  characterPrompt: Prompt,
): ScenePrompt {
  const settings: SceneCharacterSettings = {
    physicalDescription: characterPrompt.physicalDescription,
    outfit: characterPrompt.outfit,
    pose: characterPrompt.pose,
    additionalInfo: characterPrompt.additionalInfo,
    sourcePromptId: characterPrompt.id,
    presetMarkers: pickMarkers(characterPrompt, ["physicalDescription", "outfit", "pose"]),
  };

  return {
    ...scenePrompt,
    characterSettings: { ...scenePrompt.characterSettings, [characterId]: settings },
  };
}

export function loadSceneSettingsFromPrompt(
  scenePrompt: ScenePrompt,
  characterPrompt: Prompt,
): ScenePrompt {
  return {
    ...scenePrompt,
    environment: characterPrompt.environment,
    lighting: characterPrompt.lighting,
    styleModifiers: characterPrompt.styleModifiers,
    technicalModifiers: characterPrompt.technicalModifiers,
    negativePrompt: characterPrompt.negativePrompt,
    presetMarkers: pickMarkers(characterPrompt, [
      "environment",
      "lighting",
      "style",
      "technical",
      "negative",
    ]),
  };
}

function pickMarkers<K extends keyof Prompt["presetMarkers"]>(
  prompt: Prompt,
  kinds: readonly K[],
): Partial<Record<K, string>> {
  const markers: Partial<Record<K, string>> = {};
  for (const kind of kinds) {
    const name = prompt.presetMarkers[kind];
    if (name !== undefined) {
      markers[kind] = name;
    }
  }
  return markers;
}
