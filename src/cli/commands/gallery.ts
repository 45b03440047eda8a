import { readOptionalArgValue, requireOwnerArg } from "../args.js";
import { loadLibraryFromArgs, resolveOwner } from "../library.js";
import { exportGallery, type ExportableGalleryOwner } from "../../gallery/export.js";
import { orderedGalleryImages, type GalleryEntry } from "../../gallery/order.js";
import { resolveOutputPath } from "../../shared/paths.js";

export interface GalleryCommandResult {
  ownerName: string;
  entries: GalleryEntry[];
  lines: string[];
  zipPath?: string;
}

export async function runGalleryCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<GalleryCommandResult> {
  const ownerArg = requireOwnerArg(argv);
  const zipFlag = readOptionalArgValue(argv, "zip");
  const { library } = await loadLibraryFromArgs(argv, env);

  const resolved = resolveOwner(library, ownerArg);
  const owner: ExportableGalleryOwner =
    resolved.kind === "character" ? resolved.character : resolved.scene;
  const ownerName = resolved.name;

  const entries = orderedGalleryImages(owner);
  const lines = entries.map((entry, index) => `${index + 1}. ${describeEntry(owner, entry)}`);

  if (zipFlag === undefined) {
    return { ownerName, entries, lines };
  }

  const exported = await exportGallery(owner, resolveOutputPath(zipFlag));
  return { ownerName, entries, lines, zipPath: exported.zipPath };
}

function describeEntry(owner: ExportableGalleryOwner, entry: GalleryEntry): string {
  const source = entry.source;
  const size = `${entry.data.byteLength} bytes`;
  if (source.kind === "profile") {
    return `profile (${size})`;
  }
  if (source.kind === "standalone") {
    return `standalone ${entry.id} (${size})`;
  }
  const title = owner.prompts.at(source.promptIndex)?.title ?? source.promptId;
  return `prompt "${title}" ${entry.id} (${size})`;
}
