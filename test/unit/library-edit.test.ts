import { describe, expect, it } from "vitest";

import {
  addCharacter,
  addScene,
  addSceneMember,
  createCharacter,
  createScene,
  deleteCharacter,
  deleteScene,
  insertAfter,
  removeSceneMember,
} from "../../src/library/edit.js";
import { createEmptyLibrary } from "../../src/library/load.js";

describe("library edits", () => {
  it("creates empty characters and scenes", () => {
    expect(createCharacter("Luna", { bio: "A knight" }, () => "c-1")).toEqual({
      id: "c-1",
      name: "Luna",
      bio: "A knight",
      notes: "",
      prompts: [],
      standaloneImages: [],
      links: [],
      characterDefaults: {},
    });
    expect(createScene("Duel", {}, () => "s-1")).toEqual({
      id: "s-1",
      name: "Duel",
      description: "",
      notes: "",
      characterIds: [],
      prompts: [],
      standaloneImages: [],
      links: [],
      sceneDefaults: {},
    });
  });

  it("puts new characters and scenes first", () => {
    let library = createEmptyLibrary();
    library = addCharacter(library, createCharacter("Luna", {}, () => "c-1"));
    library = addCharacter(library, createCharacter("Aria", {}, () => "c-2"));
    library = addScene(library, createScene("Duel", {}, () => "s-1"));
    library = addScene(library, createScene("Feast", {}, () => "s-2"));

    expect(library.characters.map((character) => character.id)).toEqual(["c-2", "c-1"]);
    expect(library.scenes.map((scene) => scene.id)).toEqual(["s-2", "s-1"]);
  });

  it("deletes a character without touching scene membership", () => {
    let library = addCharacter(createEmptyLibrary(), createCharacter("Luna", {}, () => "c-1"));
    library = addScene(library, addSceneMember(createScene("Duel", {}, () => "s-1"), "c-1"));

    library = deleteCharacter(library, "c-1");

    expect(library.characters).toEqual([]);
    expect(library.scenes[0].characterIds).toEqual(["c-1"]);
    expect(deleteScene(library, "s-1").scenes).toEqual([]);
  });

  it("adds members once, in order, and removes them", () => {
    const scene = createScene("Duel", {}, () => "s-1");
    const withBoth = addSceneMember(addSceneMember(scene, "c-2"), "c-1");

    expect(withBoth.characterIds).toEqual(["c-2", "c-1"]);
    expect(addSceneMember(withBoth, "c-2")).toBe(withBoth);
    expect(removeSceneMember(withBoth, "c-2").characterIds).toEqual(["c-1"]);
  });

  it("inserts after a given id, or last when it is missing", () => {
    const items = [{ id: "a" }, { id: "b" }];
    expect(insertAfter(items, "a", { id: "x" })).toEqual([{ id: "a" }, { id: "x" }, { id: "b" }]);
    expect(insertAfter(items, "zz", { id: "x" })).toEqual([{ id: "a" }, { id: "b" }, { id: "x" }]);
  });
});
