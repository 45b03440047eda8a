import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { createLibraryFixture, duelLibrary } from "./fixtures.js";
import { runCharacterCommand } from "../../src/cli/commands/character.js";
import { runComposeCommand } from "../../src/cli/commands/compose.js";
import { runDefaultsCommand } from "../../src/cli/commands/defaults.js";
import { runInitCommand } from "../../src/cli/commands/init.js";
import { runPresetsCommand } from "../../src/cli/commands/presets.js";
import { runPromptCommand } from "../../src/cli/commands/prompt.js";
import { runSceneCommand } from "../../src/cli/commands/scene.js";
import { runSceneEditCommand } from "../../src/cli/commands/scene-edit.js";
import { runScenePromptCommand } from "../../src/cli/commands/scene-prompt.js";
import { main } from "../../src/cli/index.js";
import { loadLibrary } from "../../src/library/load.js";

describe("init command", () => {
  it("creates a library with starter presets and keeps it on the next run", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "castbook-init-"));
    const libraryPath = path.join(root, "castbook", "library.json");

    const created = await runInitCommand(["--library", libraryPath], {});
    expect(created).toEqual({ libraryPath, libraryCreated: true, presetCount: 20 });

    const kept = await runInitCommand(["--library", libraryPath, "--with-starter-presets=false"], {});
    expect(kept).toEqual({ libraryPath, libraryCreated: false, presetCount: 20 });
  });

  it("can start without presets and finds the library through the environment", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "castbook-init-env-"));
    const libraryPath = path.join(root, "library.json");

    const result = await runInitCommand(["--with-starter-presets", "false"], {
      CASTBOOK_LIBRARY: libraryPath,
    });
    expect(result).toEqual({ libraryPath, libraryCreated: true, presetCount: 0 });

    const { library } = await loadLibrary(libraryPath);
    expect(library.characters).toEqual([]);
    expect(library.defaultGenerator).toBe("ai-vibrant-image-generator");
  });

  it("rejects a malformed boolean flag", async () => {
    await expect(
      runInitCommand(["--library", "unused.json", "--with-starter-presets", "sometimes"], {}),
    ).rejects.toMatchObject({ code: "invalid_boolean_flag" });
  });
});

describe("compose command", () => {
  it("prints the resolved character prompt", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-compose-", duelLibrary());

    const result = await runComposeCommand(
      ["--library", libraryPath, "--character", "luna", "--prompt", "battle"],
      {},
    );

    expect(result.promptId).toBe("p-battle");
    expect(result.text).toBe(
      [
        "Name:\nLuna",
        "Physical Description:\ntall",
        "Outfit:\ngrey cloak",
        "Pose:\nguarding",
        "Environment:\nbattlefield",
        "Lighting:\nsoft daylight",
        "Negative prompt: blurry",
      ].join("\n\n"),
    );
  });

  it("applies only defaults when no prompt is named", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-compose-", duelLibrary());

    const result = await runComposeCommand(["--library", libraryPath, "--character=c-aria"], {});

    expect(result.promptId).toBeUndefined();
    expect(result.text).toBe("Name:\nAria\n\nLighting:\nsoft daylight\n\nNegative prompt: blurry");
  });

  it("reports unknown characters and prompts", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-compose-", duelLibrary());

    await expect(
      runComposeCommand(["--library", libraryPath, "--character", "Nobody"], {}),
    ).rejects.toMatchObject({ code: "character_not_found", message: 'Character "Nobody" was not found.' });
    await expect(
      runComposeCommand(["--library", libraryPath, "--character", "Luna", "--prompt", "Calm"], {}),
    ).rejects.toMatchObject({ code: "prompt_not_found" });
  });

  it("refuses to guess between characters sharing a name", async () => {
    const document = duelLibrary();
    document.characters = [
      { id: "c-1", name: "Twin" },
      { id: "c-2", name: "twin" },
    ];
    const { libraryPath } = await createLibraryFixture("castbook-compose-", document);

    await expect(
      runComposeCommand(["--library", libraryPath, "--character", "Twin"], {}),
    ).rejects.toMatchObject({
      code: "ambiguous_reference",
      message: 'Character "Twin" is ambiguous (2 matches); use an id instead.',
    });

    const byId = await runComposeCommand(["--library", libraryPath, "--character", "c-2"], {});
    expect(byId.text).toBe("Name:\ntwin\n\nLighting:\nsoft daylight\n\nNegative prompt: blurry");
  });

  it("rejects a trailing --prompt that has no value", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-compose-", duelLibrary());

    await expect(
      runComposeCommand(["--library", libraryPath, "--character", "Luna", "--prompt"], {}),
    ).rejects.toMatchObject({ code: "missing_flag", message: "Missing required flag --prompt." });
  });
});

describe("scene command", () => {
  it("prints the flat form by default", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-", duelLibrary());

    const result = await runSceneCommand(
      ["--library", libraryPath, "--scene", "Duel", "--prompt", "Opening"],
      {},
    );

    expect(result.format).toBe("flat");
    expect(result.text).toBe("Luna, wearing armor, Aria, ruins ### blur");
  });

  it("prints the labeled form", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-", duelLibrary());

    const result = await runSceneCommand(
      ["--library", libraryPath, "--scene", "s-duel", "--prompt", "sp-opening", "--format", "labeled"],
      {},
    );

    expect(result.text).toBe(
      [
        "[Luna]\nOutfit: armor",
        "[Aria]\n(No settings)",
        "[Scene Settings]\nEnvironment: ruins",
        "[Negative]\nblur",
      ].join("\n\n"),
    );
  });

  it("rejects unknown formats", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-", duelLibrary());

    await expect(
      runSceneCommand(
        ["--library", libraryPath, "--scene", "Duel", "--prompt", "Opening", "--format", "yaml"],
        {},
      ),
    ).rejects.toMatchObject({ code: "invalid_format" });
  });
});

describe("scene-prompt command", () => {
  it("creates a seeded prompt at the top of the scene", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-prompt-", duelLibrary());

    const result = await runScenePromptCommand(
      ["create", "--library", libraryPath, "--scene", "Duel", "--title", "Night"],
      {},
    );

    expect(result.scenePrompt).toMatchObject({
      title: "Night",
      environment: "castle courtyard",
      lighting: "soft daylight",
      negativePrompt: "blurry",
      characterSettings: {},
      images: [],
    });

    const { library } = await loadLibrary(libraryPath);
    expect(library.scenes[0].prompts.map((prompt) => prompt.title)).toEqual(["Night", "Opening"]);
    expect(library.scenes[0].prompts[0].id).toBe(result.scenePrompt.id);
  });

  it("duplicates a prompt next to its source", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-prompt-", duelLibrary());

    const result = await runScenePromptCommand(
      ["duplicate", "--library", libraryPath, "--scene", "Duel", "--prompt", "opening"],
      {},
    );

    expect(result.scenePrompt.title).toBe("Opening Copy");
    expect(result.scenePrompt.id).not.toBe("sp-opening");

    const { library } = await loadLibrary(libraryPath);
    const prompts = library.scenes[0].prompts;
    expect(prompts.map((prompt) => prompt.title)).toEqual(["Opening", "Opening Copy"]);
    expect(prompts[1].characterSettings).toEqual({
      "c-luna": { outfit: "armor", presetMarkers: {} },
    });
  });

  it("loads a member's settings from one of their prompts", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-prompt-", duelLibrary());

    await runScenePromptCommand(
      [
        "load",
        "--library",
        libraryPath,
        "--scene",
        "Duel",
        "--prompt",
        "Opening",
        "--from-character",
        "Luna",
        "--from-prompt",
        "Battle",
      ],
      {},
    );

    const { library } = await loadLibrary(libraryPath);
    const opening = library.scenes[0].prompts[0];
    expect(opening.characterSettings).toEqual({
      "c-luna": {
        physicalDescription: "tall",
        pose: "guarding",
        sourcePromptId: "p-battle",
        presetMarkers: {},
      },
    });
    expect(opening.environment).toBe("ruins");
  });

  it("loads scene-wide fields when asked", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-prompt-", duelLibrary());

    const result = await runScenePromptCommand(
      [
        "load",
        "--library",
        libraryPath,
        "--scene",
        "Duel",
        "--prompt",
        "Opening",
        "--from-character",
        "Luna",
        "--from-prompt",
        "Battle",
        "--scene-wide",
        "true",
      ],
      {},
    );

    expect(result.scenePrompt.environment).toBe("battlefield");
    expect(result.scenePrompt.negativePrompt).toBeUndefined();
    expect(result.scenePrompt.characterSettings).toEqual({
      "c-luna": { outfit: "armor", presetMarkers: {} },
    });
  });

  it("refuses characters that are not in the scene", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-prompt-", duelLibrary());

    await expect(
      runScenePromptCommand(
        [
          "load",
          "--library",
          libraryPath,
          "--scene",
          "Duel",
          "--prompt",
          "Opening",
          "--from-character",
          "Mira",
          "--from-prompt",
          "Calm",
        ],
        {},
      ),
    ).rejects.toMatchObject({
      code: "character_not_in_scene",
      message: "Character Mira is not part of scene Duel.",
    });
  });
});

describe("presets command", () => {
  it("saves, matches, lists and deletes presets", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-presets-", duelLibrary());
    const base = ["--library", libraryPath];

    const saved = await runPresetsCommand(
      ["save", ...base, "--kind", "lighting", "--name", "Golden Hour", "--text", "warm sunset light"],
      {},
    );
    if (saved.action !== "save") {
      throw new Error(`Unexpected action ${saved.action}`);
    }
    expect(saved.preset).toMatchObject({ kind: "lighting", name: "Golden Hour", text: "warm sunset light" });

    const overwritten = await runPresetsCommand(
      ["save", ...base, "--kind", "lighting", "--name", "golden hour", "--text", " late glow "],
      {},
    );
    expect(overwritten).toMatchObject({
      action: "save",
      preset: { id: saved.preset.id, name: "Golden Hour", text: "late glow" },
    });

    const matched = await runPresetsCommand(
      ["match", ...base, "--kind", "lighting", "--text", "late glow"],
      {},
    );
    expect(matched).toEqual({ action: "match", preset: { ...saved.preset, text: "late glow" } });

    const unmatched = await runPresetsCommand(
      ["match", ...base, "--kind", "style", "--text", "late glow"],
      {},
    );
    expect(unmatched).toEqual({ action: "match", preset: undefined });

    const listed = await runPresetsCommand(["list", ...base, "--kind", "lighting"], {});
    expect(listed).toEqual({ action: "list", presets: [{ ...saved.preset, text: "late glow" }] });

    await runPresetsCommand(["delete", ...base, "--id", saved.preset.id], {});
    const { library } = await loadLibrary(libraryPath);
    expect(library.presets).toEqual([]);

    await expect(
      runPresetsCommand(["delete", ...base, "--id", saved.preset.id], {}),
    ).rejects.toMatchObject({ code: "preset_not_found" });
  });

  it("rejects unknown section kinds", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-presets-", duelLibrary());

    await expect(
      runPresetsCommand(["list", "--library", libraryPath, "--kind", "mood"], {}),
    ).rejects.toMatchObject({ code: "invalid_section_kind" });
  });
});

describe("defaults command", () => {
  it("sets and shows defaults at each scope", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-defaults-", duelLibrary());
    const base = ["--library", libraryPath];

    const globalSet = await runDefaultsCommand(["set", ...base, "--key", "style", "--value", " ink "], {});
    expect(globalSet).toMatchObject({
      scope: "global",
      defaults: { lighting: "soft daylight", style: "ink", negative: "blurry" },
    });

    const characterShow = await runDefaultsCommand(["show", ...base, "--character", "Luna"], {});
    expect(characterShow).toMatchObject({
      scope: "character",
      ownerName: "Luna",
      defaults: { outfit: "grey cloak" },
    });

    const sceneCleared = await runDefaultsCommand(
      ["set", ...base, "--scene", "Duel", "--key", "environment", "--value="],
      {},
    );
    expect(sceneCleared.defaults).toEqual({});

    const { library } = await loadLibrary(libraryPath);
    expect(library.globalDefaults).toEqual({
      lighting: "soft daylight",
      style: "ink",
      negative: "blurry",
    });
    expect(library.scenes[0].sceneDefaults).toEqual({});
  });

  it("rejects unknown keys and a missing value", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-defaults-", duelLibrary());

    await expect(
      runDefaultsCommand(["set", "--library", libraryPath, "--key", "mood", "--value", "x"], {}),
    ).rejects.toMatchObject({ code: "invalid_section_kind" });
    await expect(
      runDefaultsCommand(["set", "--library", libraryPath, "--key", "pose"], {}),
    ).rejects.toMatchObject({ code: "missing_flag" });
  });
});

describe("character command", () => {
  it("creates a character at the top of the list", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-character-", duelLibrary());

    const result = await runCharacterCommand(
      ["create", "--library", libraryPath, "--name", " Nyx ", "--bio", "A thief"],
      {},
    );

    expect(result.character).toMatchObject({ name: "Nyx", bio: "A thief", notes: "", prompts: [] });
    const { library } = await loadLibrary(libraryPath);
    expect(library.characters.map((character) => character.name)).toEqual([
      "Nyx",
      "Luna",
      "Aria",
      "Mira",
    ]);
    expect(library.characters[0].id).toBe(result.character.id);
  });

  it("renames a character in place", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-character-", duelLibrary());

    await runCharacterCommand(
      ["rename", "--library", libraryPath, "--character", "mira", "--name", "Mirabel"],
      {},
    );

    const { library } = await loadLibrary(libraryPath);
    expect(library.characters[2]).toMatchObject({ id: "c-mira", name: "Mirabel" });
  });

  it("deletes a character and drops them from scene output", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-character-", duelLibrary());

    const result = await runCharacterCommand(
      ["delete", "--library", libraryPath, "--character", "Luna"],
      {},
    );

    expect(result.character.id).toBe("c-luna");
    const { library } = await loadLibrary(libraryPath);
    expect(library.characters.map((character) => character.id)).toEqual(["c-aria", "c-mira"]);
    expect(library.scenes[0].characterIds).toEqual(["c-luna", "c-aria"]);

    const scene = await runSceneCommand(
      ["--library", libraryPath, "--scene", "Duel", "--prompt", "Opening"],
      {},
    );
    expect(scene.text).toBe("Aria, ruins ### blur");
  });

  it("rejects unknown actions", async () => {
    await expect(runCharacterCommand(["merge", "--library", "unused.json"], {})).rejects.toMatchObject({
      code: "invalid_action",
    });
  });
});

describe("prompt command", () => {
  it("creates prompts first, titled New Prompt unless named", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-prompt-", duelLibrary());

    const created = await runPromptCommand(["create", "--library", libraryPath, "--character", "Luna"], {});
    await runPromptCommand(
      ["create", "--library", libraryPath, "--character", "Aria", "--title", "Portrait"],
      {},
    );

    expect(created.prompt).toEqual({
      id: created.prompt.id,
      title: "New Prompt",
      presetMarkers: {},
      images: [],
    });
    const { library } = await loadLibrary(libraryPath);
    expect(library.characters[0].prompts.map((prompt) => prompt.title)).toEqual([
      "New Prompt",
      "Battle",
    ]);
    expect(library.characters[1].prompts.map((prompt) => prompt.title)).toEqual(["Portrait"]);
  });

  it("duplicates a prompt next to its source and deletes prompts", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-prompt-", duelLibrary());

    const copy = await runPromptCommand(
      ["duplicate", "--library", libraryPath, "--character", "Luna", "--prompt", "battle"],
      {},
    );
    await runPromptCommand(
      ["delete", "--library", libraryPath, "--character", "Mira", "--prompt", "Calm"],
      {},
    );

    expect(copy.prompt.title).toBe("Battle Copy");
    expect(copy.prompt.id).not.toBe("p-battle");
    const { library } = await loadLibrary(libraryPath);
    const lunaPrompts = library.characters[0].prompts;
    expect(lunaPrompts.map((prompt) => prompt.title)).toEqual(["Battle", "Battle Copy"]);
    expect(lunaPrompts[1]).toMatchObject({ physicalDescription: "tall", pose: "guarding" });
    expect(library.characters[2].prompts).toEqual([]);
  });

  it("sets section text that compose then reads", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-prompt-", duelLibrary());

    const result = await runPromptCommand(
      [
        "set",
        "--library",
        libraryPath,
        "--character",
        "Luna",
        "--prompt",
        "Battle",
        "--kind",
        "lighting",
        "--text",
        "torchlight",
      ],
      {},
    );
    expect(result.prompt.lighting).toBe("torchlight");

    const composed = await runComposeCommand(
      ["--library", libraryPath, "--character", "Luna", "--prompt", "Battle"],
      {},
    );
    expect(composed.text).toBe(
      [
        "Name:\nLuna",
        "Physical Description:\ntall",
        "Outfit:\ngrey cloak",
        "Pose:\nguarding",
        "Environment:\nbattlefield",
        "Lighting:\ntorchlight",
        "Negative prompt: blurry",
      ].join("\n\n"),
    );
  });

  it("applies a preset with its marker and clears it with blank text", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-prompt-", duelLibrary());
    await runPresetsCommand(
      ["save", "--library", libraryPath, "--kind", "style", "--name", "Ink", "--text", "ink wash"],
      {},
    );
    const target = ["--library", libraryPath, "--character", "Luna", "--prompt", "Battle"];

    const applied = await runPromptCommand(["set", ...target, "--kind", "style", "--preset", "ink"], {});
    expect(applied.prompt.styleModifiers).toBe("ink wash");
    expect(applied.prompt.presetMarkers).toEqual({ style: "Ink" });

    const cleared = await runPromptCommand(["set", ...target, "--kind", "style", "--text="], {});
    expect(cleared.prompt.styleModifiers).toBeUndefined();
    expect(cleared.prompt.presetMarkers).toEqual({});

    await expect(
      runPromptCommand(["set", ...target, "--kind", "lighting", "--preset", "Ink"], {}),
    ).rejects.toMatchObject({ code: "preset_not_found" });
    await expect(
      runPromptCommand(["set", ...target, "--kind", "lighting", "--text"], {}),
    ).rejects.toMatchObject({ code: "missing_flag" });
  });
});

describe("scene editing", () => {
  it("creates, renames and deletes scenes", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-edit-", duelLibrary());

    const created = await runSceneEditCommand(["create", "--library", libraryPath, "--name", "Feast"], {});
    expect(created.scene).toMatchObject({ name: "Feast", characterIds: [], prompts: [] });

    await runSceneEditCommand(
      ["rename", "--library", libraryPath, "--scene", "feast", "--name", "Banquet"],
      {},
    );
    let { library } = await loadLibrary(libraryPath);
    expect(library.scenes.map((scene) => scene.name)).toEqual(["Banquet", "Duel"]);

    await runSceneEditCommand(["delete", "--library", libraryPath, "--scene", "Duel"], {});
    ({ library } = await loadLibrary(libraryPath));
    expect(library.scenes.map((scene) => scene.id)).toEqual([created.scene.id]);
  });

  it("adds and removes members and keeps their per-prompt settings", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-scene-edit-", duelLibrary());
    const scene = ["--library", libraryPath, "--scene", "Duel"];

    await runSceneEditCommand(["add-member", ...scene, "--character", "Mira"], {});
    await runSceneEditCommand(["add-member", ...scene, "--character", "Mira"], {});
    const removed = await runSceneEditCommand(["remove-member", ...scene, "--character", "luna"], {});

    expect(removed.scene.characterIds).toEqual(["c-aria", "c-mira"]);
    const { library } = await loadLibrary(libraryPath);
    expect(library.scenes[0].characterIds).toEqual(["c-aria", "c-mira"]);
    expect(library.scenes[0].prompts[0].characterSettings).toEqual({
      "c-luna": { outfit: "armor", presetMarkers: {} },
    });

    const composed = await runSceneCommand([...scene, "--prompt", "Opening"], {});
    expect(composed.text).toBe("Aria, Mira, ruins ### blur");

    await expect(
      runSceneEditCommand(["remove-member", ...scene, "--character", "Luna"], {}),
    ).rejects.toMatchObject({ code: "character_not_in_scene" });
  });
});

describe("main", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints the composed prompt to stdout", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-main-", duelLibrary());
    const writes: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: unknown) => {
      writes.push(String(chunk));
      return true;
    });

    const exitCode = await main([
      "scene",
      "--library",
      libraryPath,
      "--scene",
      "Duel",
      "--prompt",
      "Opening",
    ]);

    expect(exitCode).toBe(0);
    expect(writes).toEqual(["Luna, wearing armor, Aria, ruins ### blur\n"]);
  });

  it("routes scene editing actions before scene composition", async () => {
    const { libraryPath } = await createLibraryFixture("castbook-main-", duelLibrary());
    const writes: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: unknown) => {
      writes.push(String(chunk));
      return true;
    });

    const exitCode = await main([
      "scene",
      "add-member",
      "--library",
      libraryPath,
      "--scene",
      "Duel",
      "--character",
      "Mira",
    ]);

    expect(exitCode).toBe(0);
    expect(writes).toEqual([`Mira added to scene Duel -> ${libraryPath}\n`]);
  });

  it("reports errors on stderr with the error's exit code", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "castbook-main-"));
    const missing = path.join(root, "missing.json");
    const errors: string[] = [];
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: unknown) => {
      errors.push(String(chunk));
      return true;
    });

    const exitCode = await main(["compose", "--library", missing, "--character", "Luna"]);

    expect(exitCode).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^castbook: Failed to read library at /);
  });
});
