import { parseBooleanArg, readOptionalArgValue, requireArgValue, requireOwnerArg } from "../args.js";
import { loadLibraryFromArgs, resolveOwner } from "../library.js";
import { attachImage, importImageFile, type ImageTarget } from "../../library/images.js";
import { saveLibrary } from "../../library/load.js";
import { findPrompt, findScenePrompt, replaceCharacter, replaceScene } from "../../library/lookup.js";
import type { Library } from "../../model/types.js";
import { CliError } from "../../shared/errors.js";
import type { ImageInspection } from "../../shared/image.js";

export interface ImagesCommandResult {
  libraryPath: string;
  ownerName: string;
  imageId: string;
  target: ImageTarget;
  inspection: ImageInspection;
}

export async function runImagesCommand(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<ImagesCommandResult> {
  const [action, ...rest] = argv;
  if (action !== "add") {
    throw new CliError(`Unknown images action "${action ?? ""}". Use add.`, {
      code: "invalid_action",
      exitCode: 1,
    });
  }

  const ownerArg = requireOwnerArg(rest);
  const filePath = requireArgValue(rest, "file");
  const promptRef = readOptionalArgValue(rest, "prompt");
  const profileFlag = readOptionalArgValue(rest, "profile");
  const asProfile = profileFlag === undefined ? false : parseBooleanArg(profileFlag, "--profile");
  if (asProfile && promptRef !== undefined) {
    throw new CliError("Use either --prompt or --profile true, not both.", {
      code: "conflicting_flags",
      exitCode: 1,
    });
  }

  const { libraryPath, library } = await loadLibraryFromArgs(rest, env);
  const owner = resolveOwner(library, ownerArg);

  let target: ImageTarget;
  if (asProfile) {
    target = { kind: "profile" };
  } else if (promptRef === undefined) {
    target = { kind: "standalone" };
  } else {
    const prompt =
      owner.kind === "character"
        ? findPrompt(owner.character, promptRef)
        : findScenePrompt(owner.scene, promptRef);
    target = { kind: "prompt", promptId: prompt.id };
  }

  const { image, inspection } = await importImageFile(filePath);

  let next: Library;
  if (owner.kind === "character") {
    next = replaceCharacter(library, attachImage(owner.character, image, target));
  } else {
    next = replaceScene(library, attachImage(owner.scene, image, target));
  }
  await saveLibrary(libraryPath, next);

  return { libraryPath, ownerName: owner.name, imageId: image.id, target, inspection };
}
