import type { PromptImage } from "../model/types.js";
import { bytesEqual } from "../shared/bytes.js";

export const PROFILE_ENTRY_ID = "profile";

/** Anything with a profile image, prompts carrying images, and a loose pool. */
export interface GalleryOwner {
  profileImage?: Uint8Array;
  prompts: ReadonlyArray<{ id: string; images: ReadonlyArray<PromptImage> }>;
  standaloneImages: ReadonlyArray<PromptImage>;
}

export type GallerySource =
  | { kind: "profile" }
  | { kind: "prompt"; promptId: string; promptIndex: number; imageIndex: number }
  | { kind: "standalone"; imageIndex: number };

export interface GalleryEntry {
  id: string;
  data: Uint8Array;
  source: GallerySource;
}

/**
 * The one gallery sequence for an owner: profile image (only when its bytes
 * appear nowhere else), then prompt images in prompt order, then standalone
 * images. Thumbnail grids and the full-screen pager both index into this list.
 */
export function orderedGalleryImages(owner: GalleryOwner): GalleryEntry[] {
  const promptEntries: GalleryEntry[] = [];
  owner.prompts.forEach((prompt, promptIndex) => {
    prompt.images.forEach((image, imageIndex) => {
      promptEntries.push({
        id: image.id,
        data: image.data,
        source: { kind: "prompt", promptId: prompt.id, promptIndex, imageIndex },
      });
    });
  });

  const standaloneEntries: GalleryEntry[] = owner.standaloneImages.map((image, imageIndex) => ({
    id: image.id,
    data: image.data,
    source: { kind: "standalone", imageIndex },
  }));

  const entries: GalleryEntry[] = [];
  const profile = owner.profileImage;
  if (profile && !containsBytes([...promptEntries, ...standaloneEntries], profile)) {
    entries.push({ id: PROFILE_ENTRY_ID, data: profile, source: { kind: "profile" } });
  }
  entries.push(...promptEntries, ...standaloneEntries);
  return entries;
}

/** Position of an image in the gallery sequence, or -1. */
export function galleryIndexOf(entries: ReadonlyArray<GalleryEntry>, imageId: string): number {
  return entries.findIndex((entry) => entry.id === imageId);
}

function containsBytes(entries: ReadonlyArray<GalleryEntry>, data: Uint8Array): boolean {
  return entries.some((entry) => bytesEqual(entry.data, data));
}
