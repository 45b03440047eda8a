import sharp from "sharp";

import { CliError, getErrorMessage } from "./errors.js";

/**
 * Sharp instances for library images. Imports surface corruption as errors
 * (`failOn: "warning"`); exports only need the container format.
 */
export type ImageContext = "import" | "export";

export function openImage(input: Uint8Array, context: ImageContext): sharp.Sharp {
  return sharp(input, { failOn: context === "import" ? "warning" : "none" });
}

export interface ImageInspection {
  format: string;
  width: number;
  height: number;
  sizeBytes: number;
}

export async function inspectImage(data: Uint8Array, label: string): Promise<ImageInspection> {
  let metadata: sharp.Metadata;
  try {
    metadata = await openImage(data, "import").metadata();
  } catch (error) {
    throw new CliError(`Unable to read image ${label}: ${getErrorMessage(error)}`, {
      code: "image_unreadable",
      exitCode: 1,
      cause: error,
    });
  }

  if (
    typeof metadata.format !== "string" ||
    typeof metadata.width !== "number" ||
    typeof metadata.height !== "number" ||
    metadata.width <= 0 ||
    metadata.height <= 0
  ) {
    throw new CliError(`Unable to read image dimensions for ${label}.`, {
      code: "image_unreadable",
      exitCode: 1,
    });
  }

  return {
    format: metadata.format,
    width: metadata.width,
    height: metadata.height,
    sizeBytes: data.byteLength,
  };
}

/** File extension for stored bytes; `bin` when sharp does not recognise them. */
export async function detectImageExtension(data: Uint8Array): Promise<string> {
  let format: string | undefined;
  try {
    format = (await openImage(data, "export").metadata()).format;
  } catch {
    // Unrecognised bytes still export, as .bin.
    return "bin";
  }
  if (format === "jpeg") {
    return "jpg";
  }
  return format ?? "bin";
}
