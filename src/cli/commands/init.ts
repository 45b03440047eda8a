import { parseBooleanArg, readOptionalArgValue } from "../args.js";
import { createEmptyLibrary, loadLibrary, saveLibrary } from "../../library/load.js";
import { loadStarterPresets } from "../../presets/starter.js";
import { pathExists } from "../../shared/fs.js";
import { resolveLibraryPath } from "../../shared/paths.js";

export interface InitCommandArgs {
  libraryFlag?: string;
  withStarterPresets: boolean;
}

export interface InitCommandResult {
  libraryPath: string;
  libraryCreated: boolean;
  presetCount: number;
}

export function parseInitCommandArgs(argv: string[]): InitCommandArgs {
  const starterFlag = readOptionalArgValue(argv, "with-starter-presets");
  return {
    libraryFlag: readOptionalArgValue(argv, "library"),
    withStarterPresets:
      starterFlag === undefined ? true : parseBooleanArg(starterFlag, "--with-starter-presets"),
  };
}

export async function runInitCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<InitCommandResult> {
  const args = parseInitCommandArgs(argv);
  const libraryPath = resolveLibraryPath(args.libraryFlag, env);

  if (await pathExists(libraryPath)) {
    const { library } = await loadLibrary(libraryPath);
    return { libraryPath, libraryCreated: false, presetCount: library.presets.length };
  }

  const library = createEmptyLibrary();
  if (args.withStarterPresets) {
    library.presets = await loadStarterPresets();
  }
  await saveLibrary(libraryPath, library);

  return { libraryPath, libraryCreated: true, presetCount: library.presets.length };
}
