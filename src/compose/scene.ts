import type { Character, Scene, SceneCharacterText, ScenePromptText } from "../model/types.js";
import { presentText } from "../shared/text.js";

export const NEGATIVE_SEPARATOR = " ### ";
export const EMPTY_SCENE_PREVIEW = "No prompt content yet";

export type SceneMember = Pick<Character, "id" | "name">;

/**
 * Characters of a scene in the scene's own member order. Ids that no longer
 * resolve (the character was deleted elsewhere) are skipped.
 */
export function sceneMembers<T extends SceneMember>(
  scene: Pick<Scene, "characterIds">,
  characters: ReadonlyArray<T>,
): T[] {
  const byId = new Map(characters.map((character) => [character.id, character]));
  const members: T[] = [];
  for (const id of scene.characterIds) {
    const character = byId.get(id);
    if (character) {
      members.push(character);
    }
  }
  return members;
}

/**
 * Single-line form used for the clipboard and the generator: character
 * clauses, then scene-wide parts, comma separated, with the negative prompt
 * after ` ### `. Each member's clause starts with the character's name.
 * Blank values are skipped; present values are emitted exactly as stored and
 * no defaults are applied here.
 */
export function composeSceneFlat(
  scenePrompt: ScenePromptText,
  characters: ReadonlyArray<SceneMember>,
): string {
  const parts: string[] = [];

  for (const character of characters) {
    parts.push(characterClause(character, scenePrompt.characterSettings[character.id]));
  }

  const sceneWide = [
    scenePrompt.environment,
    scenePrompt.lighting,
    scenePrompt.styleModifiers,
    scenePrompt.technicalModifiers,
    scenePrompt.additionalInfo,
  ];
  for (const value of sceneWide) {
    const stored = storedText(value);
    if (stored !== undefined) {
      parts.push(stored);
    }
  }

  let result = parts.join(", ");
  const negative = storedText(scenePrompt.negativePrompt);
  if (negative !== undefined) {
    result += `${NEGATIVE_SEPARATOR}${negative}`;
  }
  return result;
}

/** Multi-block preview: one block per character, scene settings, negative. */
export function composeSceneLabeled(
  scenePrompt: ScenePromptText,
  characters: ReadonlyArray<SceneMember>,
): string {
  const blocks: string[] = [];

  for (const character of characters) {
    const settings = scenePrompt.characterSettings[character.id];
    const lines = labeledLines([
      ["Description", settings?.physicalDescription],
      ["Outfit", settings?.outfit],
      ["Pose", settings?.pose],
      ["Additional", settings?.additionalInfo],
    ]);
    const header = `[${character.name}]`;
    blocks.push(lines.length > 0 ? [header, ...lines].join("\n") : `${header}\n(No settings)`);
  }

  const sceneLines = labeledLines([
    ["Environment", scenePrompt.environment],
    ["Lighting", scenePrompt.lighting],
    ["Style", scenePrompt.styleModifiers],
    ["Technical", scenePrompt.technicalModifiers],
    ["Additional", scenePrompt.additionalInfo],
  ]);
  if (sceneLines.length > 0) {
    blocks.push(["[Scene Settings]", ...sceneLines].join("\n"));
  }

  const negative = storedText(scenePrompt.negativePrompt);
  if (negative !== undefined) {
    blocks.push(`[Negative]\n${negative}`);
  }

  return blocks.length > 0 ? blocks.join("\n\n") : EMPTY_SCENE_PREVIEW;
}

function characterClause(
  character: SceneMember,
  settings: SceneCharacterText | undefined,
): string {
  const outfit = storedText(settings?.outfit);
  const parts = [
    character.name,
    storedText(settings?.physicalDescription),
    outfit !== undefined ? `wearing ${outfit}` : undefined,
    storedText(settings?.pose),
    storedText(settings?.additionalInfo),
  ];
  return parts.filter((part): part is string => part !== undefined).join(", ");
}

function labeledLines(entries: ReadonlyArray<readonly [string, string | undefined]>): string[] {
  const lines: string[] = [];
  for (const [label, value] of entries) {
    const stored = storedText(value);
    if (stored !== undefined) {
      lines.push(`${label}: ${stored}`);
    }
  }
  return lines;
}

/** The stored value untouched, when it is not blank. */
function storedText(value: string | undefined): string | undefined {
  return presentText(value) === undefined ? undefined : value;
}
