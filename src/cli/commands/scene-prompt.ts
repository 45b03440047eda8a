import { parseBooleanArg, readOptionalArgValue, requireArgValue } from "../args.js";
import { loadLibraryFromArgs } from "../library.js";
import { insertAfter } from "../../library/edit.js";
import { saveLibrary } from "../../library/load.js";
import {
  findCharacter,
  findPrompt,
  findScene,
  findScenePrompt,
  replaceScene,
} from "../../library/lookup.js";
import type { ScenePrompt } from "../../model/types.js";
import {
  createScenePrompt,
  duplicateScenePrompt,
  loadCharacterSettingsFromPrompt,
  loadSceneSettingsFromPrompt,
} from "../../scenes/prompts.js";
import { CliError } from "../../shared/errors.js";

export type ScenePromptAction = "create" | "duplicate" | "load";

export interface ScenePromptCommandResult {
  action: ScenePromptAction;
  libraryPath: string;
  sceneId: string;
  scenePrompt: ScenePrompt;
}

export async function runScenePromptCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<ScenePromptCommandResult> {
  const [action, ...rest] = argv;
  if (action !== "create" && action !== "duplicate" && action !== "load") {
    throw new CliError(
      `Unknown scene-prompt action "${action ?? ""}". Use create, duplicate or load.`,
      { code: "invalid_action", exitCode: 1 },
    );
  }

  const sceneRef = requireArgValue(rest, "scene");
  const { libraryPath, library } = await loadLibraryFromArgs(rest, env);
  const scene = findScene(library, sceneRef);

  let scenePrompt: ScenePrompt;
  let prompts: ScenePrompt[];

  if (action === "create") {
    scenePrompt = createScenePrompt(scene, library.globalDefaults, {
      title: readOptionalArgValue(rest, "title"),
    });
    prompts = [scenePrompt, ...scene.prompts];
  } else if (action === "duplicate") {
    const source = findScenePrompt(scene, requireArgValue(rest, "prompt"));
    scenePrompt = duplicateScenePrompt(
      source,
      readOptionalArgValue(rest, "title") ?? `${source.title} Copy`,
    );
    prompts = insertAfter(scene.prompts, source.id, scenePrompt);
  } else {
    const target = findScenePrompt(scene, requireArgValue(rest, "prompt"));
    const character = findCharacter(library, requireArgValue(rest, "from-character"));
    const characterPrompt = findPrompt(character, requireArgValue(rest, "from-prompt"));
    if (!scene.characterIds.includes(character.id)) {
      throw new CliError(`Character ${character.name} is not part of scene ${scene.name}.`, {
        code: "character_not_in_scene",
        exitCode: 1,
      });
    }
    const sceneWideFlag = readOptionalArgValue(rest, "scene-wide");
    const sceneWide =
      sceneWideFlag === undefined ? false : parseBooleanArg(sceneWideFlag, "--scene-wide");

    scenePrompt = sceneWide
      ? loadSceneSettingsFromPrompt(target, characterPrompt)
      : loadCharacterSettingsFromPrompt(target, character.id, characterPrompt);
    prompts = scene.prompts.map((prompt) => (prompt.id === target.id ? scenePrompt : prompt));
  }

  await saveLibrary(libraryPath, replaceScene(library, { ...scene, prompts }));

  return { action, libraryPath, sceneId: scene.id, scenePrompt };
}
