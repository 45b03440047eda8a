import { readArgValue, readOwnerArg, requireArgValue } from "../args.js";
import { loadLibraryFromArgs, resolveOwner } from "../library.js";
import { saveLibrary } from "../../library/load.js";
import { replaceCharacter, replaceScene } from "../../library/lookup.js";
import { normalizeDefaults, setDefault } from "../../model/defaults.js";
import { DEFAULT_KEYS, isDefaultKey, type DefaultKey } from "../../model/sections.js";
import type { DefaultsMap, Library } from "../../model/types.js";
import { CliError } from "../../shared/errors.js";

export type DefaultsScope = "global" | "character" | "scene";

export interface DefaultsCommandResult {
  action: "set" | "show";
  scope: DefaultsScope;
  ownerName?: string;
  defaults: DefaultsMap;
  libraryPath: string;
}

export async function runDefaultsCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<DefaultsCommandResult> {
  const [action, ...rest] = argv;
  if (action !== "set" && action !== "show") {
    throw new CliError(`Unknown defaults action "${action ?? ""}". Use set or show.`, {
      code: "invalid_action",
      exitCode: 1,
    });
  }

  const ownerArg = readOwnerArg(rest);
  const { libraryPath, library } = await loadLibraryFromArgs(rest, env);
  const owner = ownerArg === undefined ? undefined : resolveOwner(library, ownerArg);
  const scope: DefaultsScope = owner?.kind ?? "global";

  let current: DefaultsMap;
  if (owner === undefined) {
    current = library.globalDefaults;
  } else if (owner.kind === "character") {
    current = owner.character.characterDefaults;
  } else {
    current = owner.scene.sceneDefaults;
  }

  if (action === "show") {
    return {
      action,
      scope,
      ownerName: owner?.name,
      defaults: normalizeDefaults(current),
      libraryPath,
    };
  }

  const key = parseDefaultKeyArg(requireArgValue(rest, "key"));
  // A blank --value clears the key.
  const defaults = setDefault(current, key, readValueArg(rest));

  let next: Library;
  if (owner === undefined) {
    next = { ...library, globalDefaults: defaults };
  } else if (owner.kind === "character") {
    next = replaceCharacter(library, { ...owner.character, characterDefaults: defaults });
  } else {
    next = replaceScene(library, { ...owner.scene, sceneDefaults: defaults });
  }
  await saveLibrary(libraryPath, next);

  return { action, scope, ownerName: owner?.name, defaults: normalizeDefaults(defaults), libraryPath };
}

function parseDefaultKeyArg(value: string): DefaultKey {
  const trimmed = value.trim();
  if (isDefaultKey(trimmed)) {
    return trimmed;
  }
  throw new CliError(
    `Invalid default key "${value}" for --key. Use one of: ${DEFAULT_KEYS.join(", ")}.`,
    { code: "invalid_section_kind", exitCode: 1 },
  );
}

function readValueArg(argv: string[]): string {
  const value = readArgValue(argv, "value");
  if (value === undefined) {
    throw new CliError("Missing required flag --value.", { code: "missing_flag", exitCode: 1 });
  }
  return value;
}
