import { readOptionalArgValue, type OwnerArg } from "./args.js";
import { loadLibrary, type LoadedLibrary } from "../library/load.js";
import { findCharacter, findScene } from "../library/lookup.js";
import type { Character, Library, Scene } from "../model/types.js";
import { resolveLibraryPath } from "../shared/paths.js";

export type ResolvedOwner =
  | { kind: "character"; character: Character; name: string }
  | { kind: "scene"; scene: Scene; name: string };

export async function loadLibraryFromArgs(
  argv: string[],
  env: NodeJS.ProcessEnv,
): Promise<LoadedLibrary> {
  return loadLibrary(resolveLibraryPath(readOptionalArgValue(argv, "library"), env));
}

export function resolveOwner(
  library: Library,
  owner: OwnerArg,
): ResolvedOwner {
  if (owner.kind === "character") {
    const character = findCharacter(library, owner.reference);
    return { kind: "character", character, name: character.name };
  }
  const scene = findScene(library, owner.reference);
  return { kind: "scene", scene, name: scene.name };
}
