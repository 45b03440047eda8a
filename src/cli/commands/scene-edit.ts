import { readOptionalArgValue, requireArgValue } from "../args.js";
import { loadLibraryFromArgs } from "../library.js";
import {
  addScene,
  addSceneMember,
  createScene,
  deleteScene,
  removeSceneMember,
} from "../../library/edit.js";
import { saveLibrary } from "../../library/load.js";
import { findCharacter, findScene, replaceScene } from "../../library/lookup.js";
import type { Character, Scene } from "../../model/types.js";
import { CliError } from "../../shared/errors.js";

export const SCENE_EDIT_ACTIONS = [
  "create",
  "rename",
  "delete",
  "add-member",
  "remove-member",
] as const;

export type SceneEditAction = (typeof SCENE_EDIT_ACTIONS)[number];

export function isSceneEditAction(value: string | undefined): value is SceneEditAction {
  return SCENE_EDIT_ACTIONS.some((action) => action === value);
}

export type SceneEditCommandResult =
  | { action: "create" | "rename" | "delete"; libraryPath: string; scene: Scene }
  | {
      action: "add-member" | "remove-member";
      libraryPath: string;
      scene: Scene;
      character: Character;
    };

export async function runSceneEditCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<SceneEditCommandResult> {
  const [action, ...rest] = argv;
  if (!isSceneEditAction(action)) {
    throw new CliError(
      `Unknown scene action "${action ?? ""}". Use ${SCENE_EDIT_ACTIONS.join(", ")}.`,
      { code: "invalid_action", exitCode: 1 },
    );
  }

  const { libraryPath, library } = await loadLibraryFromArgs(rest, env);

  if (action === "create") {
    const scene = createScene(requireArgValue(rest, "name").trim(), {
      description: readOptionalArgValue(rest, "description"),
      notes: readOptionalArgValue(rest, "notes"),
    });
    await saveLibrary(libraryPath, addScene(library, scene));
    return { action, libraryPath, scene };
  }

  const existing = findScene(library, requireArgValue(rest, "scene"));

  if (action === "rename") {
    const scene = { ...existing, name: requireArgValue(rest, "name").trim() };
    await saveLibrary(libraryPath, replaceScene(library, scene));
    return { action, libraryPath, scene };
  }

  if (action === "delete") {
    await saveLibrary(libraryPath, deleteScene(library, existing.id));
    return { action, libraryPath, scene: existing };
  }

  const character = findCharacter(library, requireArgValue(rest, "character"));
  if (action === "remove-member" && !existing.characterIds.includes(character.id)) {
    throw new CliError(`Character ${character.name} is not part of scene ${existing.name}.`, {
      code: "character_not_in_scene",
      exitCode: 1,
    });
  }

  const scene =
    action === "add-member"
      ? addSceneMember(existing, character.id)
      : removeSceneMember(existing, character.id);
  await saveLibrary(libraryPath, replaceScene(library, scene));
  return { action, libraryPath, scene, character };
}
