import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { LibraryDocument } from "../../src/library/schema.js";

export interface LibraryFixture {
  root: string;
  libraryPath: string;
}

export async function createLibraryFixture(
  prefix: string,
  document: LibraryDocument,
): Promise<LibraryFixture> {
  const root = await mkdtemp(path.join(os.tmpdir(), prefix));
  const libraryPath = path.join(root, "castbook", "library.json");
  await mkdir(path.dirname(libraryPath), { recursive: true });
  await writeFile(libraryPath, `${JSON.stringify(document, null, 2)}\n`, "utf8");
  return { root, libraryPath };
}

/** Three characters; only Luna and Aria are members of the duel scene. */
export function duelLibrary(): LibraryDocument {
  return {
    version: 1,
    globalDefaults: { lighting: "soft daylight", negative: "blurry" },
    presets: [],
    characters: [
      {
        id: "c-luna",
        name: "Luna",
        characterDefaults: { outfit: "grey cloak" },
        prompts: [
          {
            id: "p-battle",
            title: "Battle",
            physicalDescription: "tall",
            pose: "guarding",
            environment: "battlefield",
          },
        ],
      },
      { id: "c-aria", name: "Aria" },
      { id: "c-mira", name: "Mira", prompts: [{ id: "p-calm", title: "Calm", pose: "resting" }] },
    ],
    scenes: [
      {
        id: "s-duel",
        name: "Duel",
        characterIds: ["c-luna", "c-aria"],
        sceneDefaults: { environment: "castle courtyard" },
        prompts: [
          {
            id: "sp-opening",
            title: "Opening",
            environment: "ruins",
            negativePrompt: "blur",
            characterSettings: { "c-luna": { outfit: "armor" } },
          },
        ],
      },
    ],
  };
}
