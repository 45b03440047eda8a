import { parseSectionKindArg, readOptionalArgValue, requireArgValue } from "../args.js";
import { loadLibraryFromArgs } from "../library.js";
import { saveLibrary } from "../../library/load.js";
import { sectionLabel } from "../../model/sections.js";
import type { Preset } from "../../model/types.js";
import { PresetRegistry } from "../../presets/registry.js";
import { CliError } from "../../shared/errors.js";

export type PresetsCommandResult =
  | { action: "list"; presets: Preset[] }
  | { action: "save"; preset: Preset; libraryPath: string }
  | { action: "delete"; preset: Preset; libraryPath: string }
  | { action: "match"; preset?: Preset };

export async function runPresetsCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<PresetsCommandResult> {
  const [action, ...rest] = argv;
  const { libraryPath, library } = await loadLibraryFromArgs(rest, env);
  const registry = new PresetRegistry(library.presets);

  if (action === "list") {
    const kindFlag = readOptionalArgValue(rest, "kind");
    const presets =
      kindFlag === undefined
        ? registry.list()
        : registry.byKind(parseSectionKindArg(kindFlag, "--kind"));
    return { action, presets };
  }

  if (action === "save") {
    const kind = parseSectionKindArg(requireArgValue(rest, "kind"), "--kind");
    const preset = registry.upsert(kind, requireArgValue(rest, "name"), requireArgValue(rest, "text"));
    if (!preset) {
      throw new CliError("Preset name and text must not be blank.", {
        code: "missing_flag",
        exitCode: 1,
      });
    }
    await saveLibrary(libraryPath, { ...library, presets: registry.list() });
    return { action, preset, libraryPath };
  }

  if (action === "delete") {
    const id = requireArgValue(rest, "id").trim();
    const preset = registry.find(id);
    if (!preset || !registry.delete(id)) {
      throw new CliError(`Preset "${id}" was not found.`, {
        code: "preset_not_found",
        exitCode: 1,
      });
    }
    await saveLibrary(libraryPath, { ...library, presets: registry.list() });
    return { action, preset, libraryPath };
  }

  if (action === "match") {
    const kind = parseSectionKindArg(requireArgValue(rest, "kind"), "--kind");
    const id = registry.matchingPreset(kind, requireArgValue(rest, "text"));
    return { action, preset: id === undefined ? undefined : registry.find(id) };
  }

  throw new CliError(
    `Unknown presets action "${action ?? ""}". Use list, save, delete or match.`,
    { code: "invalid_action", exitCode: 1 },
  );
}

export function formatPresetLine(preset: Preset): string {
  return `${preset.id}  [${sectionLabel(preset.kind)}] ${preset.name}: ${preset.text}`;
}
