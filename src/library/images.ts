import path from "node:path";

import { defaultIdFactory, type IdFactory } from "../model/prompt.js";
import type { PromptImage } from "../model/types.js";
import { CliError, getErrorMessage } from "../shared/errors.js";
import { readBinaryFile } from "../shared/fs.js";
import { inspectImage, type ImageInspection } from "../shared/image.js";

export type ImageTarget =
  | { kind: "profile" }
  | { kind: "standalone" }
  | { kind: "prompt"; promptId: string };

interface ImageHolder {
  id: string;
  images: PromptImage[];
}

export interface ImageOwner {
  profileImage?: Uint8Array;
  prompts: ImageHolder[];
  standaloneImages: PromptImage[];
}

export interface ImportedImage {
  image: PromptImage;
  inspection: ImageInspection;
}

/** Reads an image file and keeps its bytes only if sharp can decode them. */
export async function importImageFile(
  filePath: string,
  createId: IdFactory = defaultIdFactory,
): Promise<ImportedImage> {
  const resolvedPath = path.resolve(filePath);

  let data: Uint8Array;
  try {
    data = await readBinaryFile(resolvedPath);
  } catch (error) {
    throw new CliError(`Failed to read image ${resolvedPath}: ${getErrorMessage(error)}`, {
      code: "image_unreadable",
      exitCode: 1,
      cause: error,
    });
  }

  const inspection = await inspectImage(data, resolvedPath);
  return { image: { id: createId(), data: new Uint8Array(data) }, inspection };
}

export function attachImage<T extends ImageOwner>(owner: T, image: PromptImage, target: ImageTarget): T {
  if (target.kind === "profile") {
    return { ...owner, profileImage: image.data };
  }
  if (target.kind === "standalone") {
    return { ...owner, standaloneImages: [...owner.standaloneImages, image] };
  }
  const { promptId } = target;
  return {
    ...owner,
    prompts: owner.prompts.map((prompt) =>
      prompt.id === promptId ? { ...prompt, images: [...prompt.images, image] } : prompt,
    ),
  };
}
