import { readOptionalArgValue, requireArgValue } from "../args.js";
import { loadLibraryFromArgs } from "../library.js";
import { composeSingleCharacterPrompt } from "../../compose/character.js";
import { findCharacter, findPrompt } from "../../library/lookup.js";
import type { PromptText } from "../../model/types.js";

export interface ComposeCommandArgs {
  character: string;
  prompt?: string;
}

export interface ComposeCommandResult {
  characterId: string;
  promptId?: string;
  text: string;
}

export function parseComposeCommandArgs(argv: string[]): ComposeCommandArgs {
  return {
    character: requireArgValue(argv, "character"),
    prompt: readOptionalArgValue(argv, "prompt"),
  };
}

export async function runComposeCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<ComposeCommandResult> {
  const args = parseComposeCommandArgs(argv);
  const { library } = await loadLibraryFromArgs(argv, env);
  const character = findCharacter(library, args.character);

  // Without a prompt, only the character and global defaults apply.
  const prompt: PromptText & { id?: string } =
    args.prompt === undefined ? {} : findPrompt(character, args.prompt);

  return {
    characterId: character.id,
    promptId: prompt.id,
    text: composeSingleCharacterPrompt(character, prompt, library.globalDefaults),
  };
}
