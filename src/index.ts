export { resolveValue } from "./compose/resolve.js";
export {
  ADDITIONAL_INFO_LABEL,
  NEGATIVE_PROMPT_PREFIX,
  composeSingleCharacterPrompt,
  resolveSection,
  type ComposableCharacter,
} from "./compose/character.js";
export {
  EMPTY_SCENE_PREVIEW,
  NEGATIVE_SEPARATOR,
  composeSceneFlat,
  composeSceneLabeled,
  sceneMembers,
  type SceneMember,
} from "./compose/scene.js";
export {
  NEW_SCENE_PROMPT_TITLE,
  createScenePrompt,
  duplicateScenePrompt,
  loadCharacterSettingsFromPrompt,
  loadSceneSettingsFromPrompt,
  seedScenePromptDefaults,
  type CreateScenePromptOptions,
  type SeededSceneFields,
} from "./scenes/prompts.js";
export {
  PROFILE_ENTRY_ID,
  galleryIndexOf,
  orderedGalleryImages,
  type GalleryEntry,
  type GalleryOwner,
  type GallerySource,
} from "./gallery/order.js";
export { exportGallery, type GalleryExportResult } from "./gallery/export.js";
export { PresetRegistry, type PresetRegistryOptions } from "./presets/registry.js";
export { loadStarterPresets } from "./presets/starter.js";
export { effectiveDefault, normalizeDefaults, setDefault } from "./model/defaults.js";
export {
  NEW_PROMPT_TITLE,
  createCharacterPrompt,
  defaultIdFactory,
  duplicatePrompt,
  promptContent,
  promptFieldFor,
  setPromptSection,
  type IdFactory,
} from "./model/prompt.js";
export {
  DEFAULT_KEYS,
  SECTION_KINDS,
  defaultKeyFor,
  isDefaultKey,
  isSectionKind,
  sectionDisplay,
  sectionKindFor,
  sectionLabel,
  type DefaultKey,
  type SectionDisplay,
  type SectionKind,
} from "./model/sections.js";
export type * from "./model/types.js";
export { DEFAULT_GENERATOR, LIBRARY_VERSION } from "./model/types.js";
export {
  createEmptyLibrary,
  loadLibrary,
  parseLibrary,
  saveLibrary,
  serializeLibrary,
  type LoadedLibrary,
} from "./library/load.js";
export {
  addCharacter,
  addScene,
  addSceneMember,
  createCharacter,
  createScene,
  deleteCharacter,
  deleteScene,
  insertAfter,
  removeSceneMember,
} from "./library/edit.js";
export {
  findCharacter,
  findPrompt,
  findScene,
  findScenePrompt,
  replaceCharacter,
  replaceScene,
} from "./library/lookup.js";
export { attachImage, importImageFile, type ImageTarget } from "./library/images.js";
export { CliError, isCliError } from "./shared/errors.js";
export { presentText } from "./shared/text.js";
