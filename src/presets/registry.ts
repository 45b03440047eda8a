import { defaultIdFactory, type IdFactory } from "../model/prompt.js";
import type { SectionKind } from "../model/sections.js";
import type { Preset } from "../model/types.js";
import { equalsIgnoringCase, presentText } from "../shared/text.js";

export interface PresetRegistryOptions {
  createId?: IdFactory;
}

/**
 * Named text snippets per section. A preset is identified for saving by its
 * kind plus its name compared case-insensitively, so saving under an existing
 * name replaces the text in place.
 */
export class PresetRegistry {
  private readonly presets: Preset[];
  private readonly createId: IdFactory;

  constructor(presets: ReadonlyArray<Preset> = [], options: PresetRegistryOptions = {}) {
    this.presets = presets.map((preset) => ({ ...preset }));
    this.createId = options.createId ?? defaultIdFactory;
  }

  /**
   * Saves a preset and returns it. Blank names or texts are ignored and
   * return `undefined`.
   */
  upsert(kind: SectionKind, name: string, text: string): Preset | undefined {
    const trimmedName = presentText(name);
    const trimmedText = presentText(text);
    if (!trimmedName || !trimmedText) {
      return undefined;
    }

    const existing = this.presets.find(
      (preset) => preset.kind === kind && equalsIgnoringCase(preset.name, trimmedName),
    );
    if (existing) {
      existing.text = trimmedText;
      return { ...existing };
    }

    const preset: Preset = { id: this.createId(), kind, name: trimmedName, text: trimmedText };
    this.presets.push(preset);
    return { ...preset };
  }

  delete(id: string): boolean {
    const index = this.presets.findIndex((preset) => preset.id === id);
    if (index < 0) {
      return false;
    }
    this.presets.splice(index, 1);
    return true;
  }

  byKind(kind: SectionKind): Preset[] {
    return this.presets.filter((preset) => preset.kind === kind).map((preset) => ({ ...preset }));
  }

  find(id: string): Preset | undefined {
    const preset = this.presets.find((candidate) => candidate.id === id);
    return preset ? { ...preset } : undefined;
  }

  /** Id of the first preset of `kind` whose text equals the trimmed input. */
  matchingPreset(kind: SectionKind, text: string | null | undefined): string | undefined {
    const trimmed = presentText(text);
    if (!trimmed) {
      return undefined;
    }
    return this.presets.find((preset) => preset.kind === kind && preset.text === trimmed)?.id;
  }

  list(): Preset[] {
    return this.presets.map((preset) => ({ ...preset }));
  }
}
