import { createWriteStream } from "node:fs";
import path from "node:path";

import { ZipFile } from "yazl";

import { orderedGalleryImages, type GalleryEntry, type GalleryOwner } from "./order.js";
import { ensureParentDir } from "../shared/fs.js";
import { detectImageExtension } from "../shared/image.js";

export interface ExportableGalleryOwner extends GalleryOwner {
  prompts: ReadonlyArray<GalleryOwner["prompts"][number] & { title: string }>;
}

export interface GalleryExportResult {
  zipPath: string;
  entries: string[];
}

/**
 * Writes the owner's gallery to a zip archive in gallery order. Entry names
 * are numbered so that archive order and gallery order agree.
 */
export async function exportGallery(
  owner: ExportableGalleryOwner,
  zipPath: string,
): Promise<GalleryExportResult> {
  const resolvedZipPath = path.resolve(zipPath);
  await ensureParentDir(resolvedZipPath);

  const gallery = orderedGalleryImages(owner);
  const width = Math.max(3, String(gallery.length).length);
  const named: Array<{ name: string; data: Uint8Array }> = [];
  for (const [index, entry] of gallery.entries()) {
    const extension = await detectImageExtension(entry.data);
    const number = String(index + 1).padStart(width, "0");
    named.push({ name: `${number}-${entryLabel(owner, entry)}.${extension}`, data: entry.data });
  }

  await new Promise<void>((resolve, reject) => {
    const zipFile = new ZipFile();
    const zipOutput = createWriteStream(resolvedZipPath);

    zipOutput.on("close", () => resolve());
    zipOutput.on("error", (error) => reject(error));
    zipFile.outputStream.on("error", (error) => reject(error));

    zipFile.outputStream.pipe(zipOutput);

    for (const item of named) {
      zipFile.addBuffer(Buffer.from(item.data), item.name);
    }

    zipFile.end();
  });

  return { zipPath: resolvedZipPath, entries: named.map((item) => item.name) };
}

export function entryLabel(owner: ExportableGalleryOwner, entry: GalleryEntry): string {
  const source = entry.source;
  if (source.kind === "profile") {
    return "profile";
  }
  if (source.kind === "standalone") {
    return "standalone";
  }
  const title = owner.prompts.at(source.promptIndex)?.title ?? "";
  return slugify(title) || "prompt";
}

export function slugify(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
