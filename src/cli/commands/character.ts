import { readOptionalArgValue, requireArgValue } from "../args.js";
import { loadLibraryFromArgs } from "../library.js";
import { addCharacter, createCharacter, deleteCharacter } from "../../library/edit.js";
import { saveLibrary } from "../../library/load.js";
import { findCharacter, replaceCharacter } from "../../library/lookup.js";
import type { Character } from "../../model/types.js";
import { CliError } from "../../shared/errors.js";

export type CharacterAction = "create" | "rename" | "delete";

export interface CharacterCommandResult {
  action: CharacterAction;
  libraryPath: string;
  character: Character;
}

export async function runCharacterCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<CharacterCommandResult> {
  const [action, ...rest] = argv;
  if (action !== "create" && action !== "rename" && action !== "delete") {
    throw new CliError(
      `Unknown character action "${action ?? ""}". Use create, rename or delete.`,
      { code: "invalid_action", exitCode: 1 },
    );
  }

  const { libraryPath, library } = await loadLibraryFromArgs(rest, env);

  if (action === "create") {
    const character = createCharacter(requireArgValue(rest, "name").trim(), {
      bio: readOptionalArgValue(rest, "bio"),
      notes: readOptionalArgValue(rest, "notes"),
    });
    await saveLibrary(libraryPath, addCharacter(library, character));
    return { action, libraryPath, character };
  }

  const existing = findCharacter(library, requireArgValue(rest, "character"));

  if (action === "rename") {
    const character = { ...existing, name: requireArgValue(rest, "name").trim() };
    await saveLibrary(libraryPath, replaceCharacter(library, character));
    return { action, libraryPath, character };
  }

  await saveLibrary(libraryPath, deleteCharacter(library, existing.id));
  return { action, libraryPath, character: existing };
}
