import path from "node:path";

import {
  safeParseLibrary,
  type CharacterDocument,
  type LibraryDocument,
  type PromptDocument,
  type PromptImageDocument,
  type SceneDocument,
  type ScenePromptDocument,
} from "./schema.js";
import {
  DEFAULT_GENERATOR,
  LIBRARY_VERSION,
  type Character,
  type Library,
  type Prompt,
  type PromptImage,
  type Scene,
  type ScenePrompt,
} from "../model/types.js";
import { toBase64 } from "../shared/bytes.js";
import { CliError, getErrorMessage } from "../shared/errors.js";
import { readTextFile, writeJsonFile } from "../shared/fs.js";
import { describeFirstIssue } from "../shared/zod.js";

export interface LoadedLibrary {
  libraryPath: string;
  library: Library;
}

export function createEmptyLibrary(): Library {
  return {
    version: LIBRARY_VERSION,
    characters: [],
    scenes: [],
    presets: [],
    globalDefaults: {},
    defaultGenerator: DEFAULT_GENERATOR,
  };
}

export async function loadLibrary(libraryPath: string): Promise<LoadedLibrary> {
  const resolvedPath = path.resolve(libraryPath);

  let raw: string;
  try {
    raw = await readTextFile(resolvedPath);
  } catch (error) {
    throw new CliError(`Failed to read library at ${resolvedPath}: ${getErrorMessage(error)}`, {
      code: "library_read_failed",
      exitCode: 1,
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw) as unknown;
  } catch (error) {
    throw new CliError(
      `Failed to parse JSON in library ${resolvedPath}: ${getErrorMessage(error)}`,
      { code: "library_json_invalid", exitCode: 1, cause: error },
    );
  }

  return { libraryPath: resolvedPath, library: parseLibrary(data) };
}

export function parseLibrary(data: unknown): Library {
  const parsed = safeParseLibrary(data);
  if (!parsed.success) {
    const { where, what } = describeFirstIssue(parsed.error);
    throw new CliError(`Library schema validation failed at ${where}: ${what}`, {
      code: "library_schema_invalid",
      exitCode: 1,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export async function saveLibrary(libraryPath: string, library: Library): Promise<void> {
  await writeJsonFile(path.resolve(libraryPath), serializeLibrary(library));
}

/** JSON-ready form of the library; image bytes become base64. */
export function serializeLibrary(library: Library): LibraryDocument {
  return {
    version: library.version,
    defaultGenerator: library.defaultGenerator,
    globalDefaults: { ...library.globalDefaults },
    presets: library.presets.map((preset) => ({ ...preset })),
    characters: library.characters.map(serializeCharacter),
    scenes: library.scenes.map(serializeScene),
  };
}

function serializeCharacter(character: Character): CharacterDocument {
  return {
    ...character,
    prompts: character.prompts.map(serializePrompt),
    profileImage: character.profileImage ? toBase64(character.profileImage) : undefined,
    standaloneImages: character.standaloneImages.map(serializeImage),
  };
}

function serializeScene(scene: Scene): SceneDocument {
  return {
    ...scene,
    prompts: scene.prompts.map(serializeScenePrompt),
    profileImage: scene.profileImage ? toBase64(scene.profileImage) : undefined,
    standaloneImages: scene.standaloneImages.map(serializeImage),
  };
}

function serializePrompt(prompt: Prompt): PromptDocument {
  return { ...prompt, images: prompt.images.map(serializeImage) };
}

function serializeScenePrompt(prompt: ScenePrompt): ScenePromptDocument {
  return { ...prompt, images: prompt.images.map(serializeImage) };
}

function serializeImage(image: PromptImage): PromptImageDocument {
  return { id: image.id, data: toBase64(image.data) };
}
