import { parseSectionKindArg, readArgValue, readOptionalArgValue, requireArgValue } from "../args.js";
import { loadLibraryFromArgs } from "../library.js";
import { insertAfter } from "../../library/edit.js";
import { saveLibrary } from "../../library/load.js";
import { findCharacter, findPrompt, replaceCharacter } from "../../library/lookup.js";
import {
  NEW_PROMPT_TITLE,
  createCharacterPrompt,
  duplicatePrompt,
  setPromptSection,
} from "../../model/prompt.js";
import type { SectionKind } from "../../model/sections.js";
import type { Library, Preset, Prompt } from "../../model/types.js";
import { PresetRegistry } from "../../presets/registry.js";
import { CliError } from "../../shared/errors.js";
import { equalsIgnoringCase } from "../../shared/text.js";

export type PromptAction = "create" | "duplicate" | "delete" | "set";

export interface PromptCommandResult {
  action: PromptAction;
  libraryPath: string;
  characterId: string;
  prompt: Prompt;
}

export async function runPromptCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<PromptCommandResult> {
  const [action, ...rest] = argv;
  if (action !== "create" && action !== "duplicate" && action !== "delete" && action !== "set") {
    throw new CliError(
      `Unknown prompt action "${action ?? ""}". Use create, duplicate, delete or set.`,
      { code: "invalid_action", exitCode: 1 },
    );
  }

  const characterRef = requireArgValue(rest, "character");
  const { libraryPath, library } = await loadLibraryFromArgs(rest, env);
  const character = findCharacter(library, characterRef);

  let prompt: Prompt;
  let prompts: Prompt[];

  if (action === "create") {
    prompt = createCharacterPrompt(readOptionalArgValue(rest, "title") ?? NEW_PROMPT_TITLE);
    prompts = [prompt, ...character.prompts];
  } else {
    const source = findPrompt(character, requireArgValue(rest, "prompt"));
    if (action === "duplicate") {
      prompt = duplicatePrompt(source, readOptionalArgValue(rest, "title") ?? `${source.title} Copy`);
      prompts = insertAfter(character.prompts, source.id, prompt);
    } else if (action === "delete") {
      prompt = source;
      prompts = character.prompts.filter((existing) => existing.id !== source.id);
    } else {
      prompt = applySectionArgs(source, rest, library);
      prompts = character.prompts.map((existing) => (existing.id === source.id ? prompt : existing));
    }
  }

  await saveLibrary(libraryPath, replaceCharacter(library, { ...character, prompts }));

  return { action, libraryPath, characterId: character.id, prompt };
}

/** `--preset` applies a stored preset's text; `--text` writes text directly. */
function applySectionArgs(prompt: Prompt, argv: string[], library: Library): Prompt {
  const kind = parseSectionKindArg(requireArgValue(argv, "kind"), "--kind");
  const presetRef = readOptionalArgValue(argv, "preset");

  if (presetRef !== undefined) {
    const preset = findPresetOfKind(library, kind, presetRef);
    return setPromptSection(prompt, kind, preset.text, preset.name);
  }

  const text = readArgValue(argv, "text");
  if (text === undefined) {
    throw new CliError("Missing required flag --text or --preset.", {
      code: "missing_flag",
      exitCode: 1,
    });
  }
  return setPromptSection(prompt, kind, text);
}

function findPresetOfKind(library: Library, kind: SectionKind, reference: string): Preset {
  const registry = new PresetRegistry(library.presets);
  const trimmed = reference.trim();
  const byId = registry.find(trimmed);
  const preset =
    byId?.kind === kind
      ? byId
      : registry.byKind(kind).find((candidate) => equalsIgnoringCase(candidate.name, trimmed));
  if (!preset) {
    throw new CliError(`Preset "${reference}" was not found for ${kind}.`, {
      code: "preset_not_found",
      exitCode: 1,
    });
  }
  return preset;
}
