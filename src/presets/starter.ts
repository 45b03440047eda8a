import { fileURLToPath } from "node:url";

import { z } from "zod";

import { PresetRegistry } from "./registry.js";
import { SectionKindSchema } from "../library/schema.js";
import type { IdFactory } from "../model/prompt.js";
import type { Preset } from "../model/types.js";
import { CliError, getErrorMessage } from "../shared/errors.js";
import { readTextFile } from "../shared/fs.js";
import { describeFirstIssue } from "../shared/zod.js";

export const STARTER_PRESETS_PATH = fileURLToPath(
  new URL("../../data/starter-presets.json", import.meta.url),
);

const StarterPresetSchema = z.object({
  kind: SectionKindSchema,
  name: z.string().trim().min(1),
  text: z.string().trim().min(1),
});

export async function loadStarterPresets(
  createId?: IdFactory,
  filePath: string = STARTER_PRESETS_PATH,
): Promise<Preset[]> {
  let data: unknown;
  try {
    data = JSON.parse(await readTextFile(filePath)) as unknown;
  } catch (error) {
    throw new CliError(`Failed to read starter presets at ${filePath}: ${getErrorMessage(error)}`, {
      code: "starter_presets_unreadable",
      exitCode: 1,
      cause: error,
    });
  }

  const parsed = z.array(StarterPresetSchema).safeParse(data);
  if (!parsed.success) {
    const { where, what } = describeFirstIssue(parsed.error);
    throw new CliError(`Starter presets are invalid at ${where}: ${what}`, {
      code: "starter_presets_invalid",
      exitCode: 1,
      cause: parsed.error,
    });
  }

  const registry = new PresetRegistry([], { createId });
  for (const entry of parsed.data) {
    registry.upsert(entry.kind, entry.name, entry.text);
  }
  return registry.list();
}
