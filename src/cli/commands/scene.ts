import { readOptionalArgValue, requireArgValue } from "../args.js";
import { loadLibraryFromArgs } from "../library.js";
import { composeSceneFlat, composeSceneLabeled, sceneMembers } from "../../compose/scene.js";
import { findScene, findScenePrompt } from "../../library/lookup.js";
import { CliError } from "../../shared/errors.js";

export type SceneFormat = "flat" | "labeled";

export interface SceneCommandArgs {
  scene: string;
  prompt: string;
  format: SceneFormat;
}

export interface SceneCommandResult {
  sceneId: string;
  promptId: string;
  format: SceneFormat;
  text: string;
}

export function parseSceneCommandArgs(argv: string[]): SceneCommandArgs {
  return {
    scene: requireArgValue(argv, "scene"),
    prompt: requireArgValue(argv, "prompt"),
    format: parseSceneFormat(readOptionalArgValue(argv, "format")),
  };
}

export async function runSceneCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<SceneCommandResult> {
  const args = parseSceneCommandArgs(argv);
  const { library } = await loadLibraryFromArgs(argv, env);
  const scene = findScene(library, args.scene);
  const scenePrompt = findScenePrompt(scene, args.prompt);
  const members = sceneMembers(scene, library.characters);

  const text =
    args.format === "labeled"
      ? composeSceneLabeled(scenePrompt, members)
      : composeSceneFlat(scenePrompt, members);

  return { sceneId: scene.id, promptId: scenePrompt.id, format: args.format, text };
}

function parseSceneFormat(value: string | undefined): SceneFormat {
  if (value === undefined) {
    return "flat";
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "flat" || normalized === "labeled") {
    return normalized;
  }
  throw new CliError(`Invalid --format "${value}". Use flat or labeled.`, {
    code: "invalid_format",
    exitCode: 1,
  });
}
