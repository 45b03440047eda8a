import type { Character, Library, Prompt, Scene, ScenePrompt } from "../model/types.js";
import { CliError } from "../shared/errors.js";
import { equalsIgnoringCase } from "../shared/text.js";

interface Identified {
  id: string;
}

/**
 * Finds one item by exact id, falling back to a case-insensitive match on its
 * display name. A name shared by several items is reported, not guessed.
 */
function findByReference<T extends Identified>(
  items: ReadonlyArray<T>,
  reference: string,
  displayName: (item: T) => string,
  what: string,
  notFoundCode: string,
): T {
  const trimmed = reference.trim();
  const byId = items.find((item) => item.id === trimmed);
  if (byId) {
    return byId;
  }

  const byName = items.filter((item) => equalsIgnoringCase(displayName(item).trim(), trimmed));
  if (byName.length === 1) {
    return byName[0];
  }
  if (byName.length > 1) {
    throw new CliError(
      `${what} "${reference}" is ambiguous (${byName.length} matches); use an id instead.`,
      { code: "ambiguous_reference", exitCode: 1 },
    );
  }

  throw new CliError(`${what} "${reference}" was not found.`, {
    code: notFoundCode,
    exitCode: 1,
  });
}

export function findCharacter(library: Library, reference: string): Character {
  return findByReference(
    library.characters,
    reference,
    (character) => character.name,
    "Character",
    "character_not_found",
  );
}

export function findScene(library: Library, reference: string): Scene {
  return findByReference(library.scenes, reference, (scene) => scene.name, "Scene", "scene_not_found");
}

export function findPrompt(character: Character, reference: string): Prompt {
  return findByReference(
    character.prompts,
    reference,
    (prompt) => prompt.title,
    `Prompt of ${character.name}`,
    "prompt_not_found",
  );
}

export function findScenePrompt(scene: Scene, reference: string): ScenePrompt {
  return findByReference(
    scene.prompts,
    reference,
    (prompt) => prompt.title,
    `Prompt of scene ${scene.name}`,
    "prompt_not_found",
  );
}

export function replaceCharacter(library: Library, character: Character): Library {
  return {
    ...library,
    characters: library.characters.map((existing) =>
      existing.id === character.id ? character : existing,
    ),
  };
}

export function replaceScene(library: Library, scene: Scene): Library {
  return {
    ...library,
    scenes: library.scenes.map((existing) => (existing.id === scene.id ? scene : existing)),
  };
}
