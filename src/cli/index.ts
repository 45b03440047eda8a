#!/usr/bin/env node
import { realpathSync } from "node:fs";
import path from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";

import { runCharacterCommand } from "./commands/character.js";
import { runComposeCommand } from "./commands/compose.js";
import { runDefaultsCommand } from "./commands/defaults.js";
import { runGalleryCommand } from "./commands/gallery.js";
import { runImagesCommand } from "./commands/images.js";
import { runInitCommand } from "./commands/init.js";
import { formatPresetLine, runPresetsCommand } from "./commands/presets.js";
import { runPromptCommand } from "./commands/prompt.js";
import { runSceneCommand } from "./commands/scene.js";
import {
  isSceneEditAction,
  runSceneEditCommand,
  type SceneEditCommandResult,
} from "./commands/scene-edit.js";
import { runScenePromptCommand } from "./commands/scene-prompt.js";
import { DEFAULT_KEYS } from "../model/sections.js";
import { getErrorExitCode, getErrorMessage } from "../shared/errors.js";

export async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;

  if (!command || isHelpFlag(command)) {
    writeUsage("stdout");
    return 0;
  }

  try {
    if (command === "init") {
      const result = await runInitCommand(rest);
      process.stdout.write(
        `Initialized ${result.libraryPath} (library ${result.libraryCreated ? "created" : "kept"}, ${result.presetCount} preset(s)).\n`,
      );
      return 0;
    }

    if (command === "compose") {
      const result = await runComposeCommand(rest);
      process.stdout.write(`${result.text}\n`);
      return 0;
    }

    if (command === "character") {
      const result = await runCharacterCommand(rest);
      const verb = { create: "Created", rename: "Renamed", delete: "Deleted" }[result.action];
      process.stdout.write(
        `${verb} character ${result.character.name} (${result.character.id}) -> ${result.libraryPath}\n`,
      );
      return 0;
    }

    if (command === "prompt") {
      const result = await runPromptCommand(rest);
      const verb = {
        create: "created",
        duplicate: "duplicated",
        delete: "deleted",
        set: "updated",
      }[result.action];
      process.stdout.write(
        `Prompt "${result.prompt.title}" (${result.prompt.id}) ${verb} -> ${result.libraryPath}\n`,
      );
      return 0;
    }

    if (command === "scene" && isSceneEditAction(rest[0])) {
      const result = await runSceneEditCommand(rest);
      process.stdout.write(`${describeSceneEdit(result)} -> ${result.libraryPath}\n`);
      return 0;
    }

    if (command === "scene") {
      const result = await runSceneCommand(rest);
      process.stdout.write(`${result.text}\n`);
      return 0;
    }

    if (command === "scene-prompt") {
      const result = await runScenePromptCommand(rest);
      process.stdout.write(
        `Scene prompt "${result.scenePrompt.title}" (${result.scenePrompt.id}) ${describeScenePromptAction(result.action)} -> ${result.libraryPath}\n`,
      );
      return 0;
    }

    if (command === "gallery") {
      const result = await runGalleryCommand(rest);
      const lines = [
        `Gallery of ${result.ownerName}: ${result.entries.length} image(s).`,
        ...result.lines,
      ];
      if (result.zipPath) {
        lines.push(`Archive: ${result.zipPath}`);
      }
      process.stdout.write(`${lines.join("\n")}\n`);
      return 0;
    }

    if (command === "presets") {
      const result = await runPresetsCommand(rest);
      if (result.action === "list") {
        const lines = result.presets.map(formatPresetLine);
        process.stdout.write(lines.length > 0 ? `${lines.join("\n")}\n` : "No presets.\n");
      } else if (result.action === "match") {
        process.stdout.write(
          result.preset ? `${formatPresetLine(result.preset)}\n` : "No matching preset.\n",
        );
      } else {
        const verb = result.action === "save" ? "Saved" : "Deleted";
        process.stdout.write(`${verb} ${formatPresetLine(result.preset)}\n`);
      }
      return 0;
    }

    if (command === "defaults") {
      const result = await runDefaultsCommand(rest);
      const scopeLabel = result.ownerName ? `${result.scope} ${result.ownerName}` : result.scope;
      const lines = DEFAULT_KEYS.flatMap((key) => {
        const value = result.defaults[key];
        return value === undefined ? [] : [`${key}: ${value}`];
      });
      process.stdout.write(
        [`Defaults (${scopeLabel}):`, ...(lines.length > 0 ? lines : ["(none)"])].join("\n") +
          "\n",
      );
      return 0;
    }

    if (command === "images") {
      const result = await runImagesCommand(rest);
      const { format, width, height } = result.inspection;
      process.stdout.write(
        `Added ${format} ${width}x${height} image ${result.imageId} to ${result.ownerName} (${result.target.kind}).\n`,
      );
      return 0;
    }

    process.stderr.write(`castbook: unknown command "${command}"\n`);
    writeUsage("stderr");
    return 1;
  } catch (error) {
    process.stderr.write(`castbook: ${getErrorMessage(error)}\n`);
    return getErrorExitCode(error, 1);
  }
}

function describeScenePromptAction(action: "create" | "duplicate" | "load"): string {
  if (action === "create") {
    return "created";
  }
  if (action === "duplicate") {
    return "duplicated";
  }
  return "updated";
}

function describeSceneEdit(result: SceneEditCommandResult): string {
  if (result.action === "add-member") {
    return `${result.character.name} added to scene ${result.scene.name}`;
  }
  if (result.action === "remove-member") {
    return `${result.character.name} removed from scene ${result.scene.name}`;
  }
  const verb = { create: "created", rename: "renamed", delete: "deleted" }[result.action];
  return `Scene ${result.scene.name} (${result.scene.id}) ${verb}`;
}

function writeUsage(stream: "stdout" | "stderr"): void {
  const output = stream === "stderr" ? process.stderr : process.stdout;
  output.write(
    [
      "Usage: castbook <command> [options]",
      "",
      "Commands:",
      "  init                         Create the library file (kept when it exists)",
      "  compose                      Print a character prompt",
      "  character create|rename|delete",
      "                               Manage characters",
      "  prompt create|duplicate|delete|set",
      "                               Manage a character's prompts and their section text",
      "  scene                        Print a scene prompt (flat or labeled)",
      "  scene create|rename|delete|add-member|remove-member",
      "                               Manage scenes and their members",
      "  scene-prompt create          Add a scene prompt seeded from defaults",
      "  scene-prompt duplicate       Copy a scene prompt without its images",
      "  scene-prompt load            Fill a scene prompt from a character prompt",
      "  gallery                      List or export a character or scene gallery",
      "  presets list|save|delete|match",
      "                               Manage named section presets",
      "  defaults set|show            Manage global, character or scene defaults",
      "  images add                   Import an image into a gallery",
      "",
      "Options:",
      "  --library <path>             Library file (default $CASTBOOK_LIBRARY or castbook/library.json)",
      "  --with-starter-presets <true|false>",
      "                               Seed a new library with starter presets (default true)",
      "  --character <id|name>        Character to act on",
      "  --scene <id|name>            Scene to act on",
      "  --prompt <id|title>          Prompt of the character or scene",
      "  --title <title>              Title for a new or duplicated prompt",
      "  --from-character <id|name>   Character whose prompt is loaded (scene-prompt load)",
      "  --from-prompt <id|title>     Character prompt to load from (scene-prompt load)",
      "  --scene-wide <true|false>    Load scene-wide fields instead of character settings",
      "  --format <flat|labeled>      Scene prompt form (default flat)",
      "  --zip <path>                 Export the gallery to a zip archive",
      "  --kind <section>             Section kind for presets and prompt set",
      "  --name <name>                Preset, character or scene name",
      "  --text <text>                Preset or section text (blank clears a section)",
      "  --preset <id|name>           Preset whose text prompt set applies",
      "  --bio <text>                 Bio of a new character",
      "  --description <text>         Description of a new scene",
      "  --notes <text>               Notes of a new character or scene",
      "  --id <id>                    Preset id",
      "  --key <section>              Default key",
      "  --value <text>               Default value (blank clears it)",
      "  --file <path>                Image file to import",
      "  --profile <true|false>       Store the image as the profile image",
      "",
    ].join("\n"),
  );
}

function isHelpFlag(value: string): boolean {
  return value === "help" || value === "--help" || value === "-h";
}

function isDirectExecution(): boolean {
  const argvEntry = process.argv[1];
  if (!argvEntry) {
    return false;
  }

  // npm links the bin, so compare real paths.
  return pathToFileURL(realpathSync(path.resolve(argvEntry))).href === import.meta.url;
}

if (isDirectExecution()) {
  main(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error) => {
      process.stderr.write(`castbook: ${getErrorMessage(error)}\n`);
      process.exitCode = getErrorExitCode(error, 1);
    });
}
