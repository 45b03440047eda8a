import { defaultIdFactory, type IdFactory } from "../model/prompt.js";
import type { Character, Library, Scene } from "../model/types.js";

export function createCharacter(
  name: string,
  details: Partial<Pick<Character, "bio" | "notes">> = {},
  createId: IdFactory = defaultIdFactory,
): Character {
  return {
    id: createId(),
    name,
    bio: details.bio ?? "",
    notes: details.notes ?? "",
    prompts: [],
    standaloneImages: [],
    links: [],
    characterDefaults: {},
  };
}

export function createScene(
  name: string,
  details: Partial<Pick<Scene, "description" | "notes">> = {},
  createId: IdFactory = defaultIdFactory,
): Scene {
  return {
    id: createId(),
    name,
    description: details.description ?? "",
    notes: details.notes ?? "",
    characterIds: [],
    prompts: [],
    standaloneImages: [],
    links: [],
    sceneDefaults: {},
  };
}

/** New characters go to the top of the list. */
export function addCharacter(library: Library, character: Character): Library {
  return { ...library, characters: [character, ...library.characters] };
}

export function addScene(library: Library, scene: Scene): Library {
  return { ...library, scenes: [scene, ...library.scenes] };
}

/**
 * Removes the character only. Scenes keep the id in `characterIds`; member
 * lookups skip ids that no longer resolve.
 */
export function deleteCharacter(library: Library, characterId: string): Library {
  return {
    ...library,
    characters: library.characters.filter((character) => character.id !== characterId),
  };
}

export function deleteScene(library: Library, sceneId: string): Library {
  return { ...library, scenes: library.scenes.filter((scene) => scene.id !== sceneId) };
}

/** Appends a member. Adding someone already in the scene changes nothing. */
export function addSceneMember(scene: Scene, characterId: string): Scene {
  if (scene.characterIds.includes(characterId)) {
    return scene;
  }
  return { ...scene, characterIds: [...scene.characterIds, characterId] };
}

/**
 * Drops a member from the scene's list. Per-prompt character settings are
 * kept, so adding the character back restores them.
 */
export function removeSceneMember(scene: Scene, characterId: string): Scene {
  return { ...scene, characterIds: scene.characterIds.filter((id) => id !== characterId) };
}

/** Inserts `item` right after the element with `afterId`, or last when it is missing. */
export function insertAfter<T extends { id: string }>(
  items: ReadonlyArray<T>,
  afterId: string,
  item: T,
): T[] {
  const index = items.findIndex((existing) => existing.id === afterId);
  if (index === -1) {
    return [...items, item];
  }
  return [...items.slice(0, index + 1), item, ...items.slice(index + 1)];
}
