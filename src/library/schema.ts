import { z } from "zod";

import {
  SECTION_KINDS,
  DEFAULT_KEYS,
  isDefaultKey,
  isSectionKind,
} from "../model/sections.js";
import {
  DEFAULT_GENERATOR,
  LIBRARY_VERSION,
  type CharacterSectionKind,
  type Library,
  type SceneWideSectionKind,
} from "../model/types.js";
import { fromBase64 } from "../shared/bytes.js";
import { presentText } from "../shared/text.js";

// ---------- Primitives ----------

const nonEmptyString = z.string().trim().min(1);
const optionalText = z.string().optional();
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export const SectionKindSchema = z.string().refine(isSectionKind, {
  message: `Expected one of: ${SECTION_KINDS.join(", ")}.`,
});

export const DefaultKeySchema = z.string().refine(isDefaultKey, {
  message: `Expected one of: ${DEFAULT_KEYS.join(", ")}.`,
});

const ImageBytesSchema = z
  .string()
  .refine((value) => value.length % 4 === 0 && BASE64_PATTERN.test(value), {
    message: "Image data must be base64.",
  })
  .transform((value) => fromBase64(value));

function isCharacterSectionKind(value: string): value is CharacterSectionKind {
  return value === "physicalDescription" || value === "outfit" || value === "pose";
}

function isSceneWideSectionKind(value: string): value is SceneWideSectionKind {
  return isSectionKind(value) && !isCharacterSectionKind(value);
}

/**
 * String map keyed by a closed set. Unknown keys are issues; blank values are
 * dropped and the rest trimmed.
 */
function keyedTextRecord<K extends string>(isKey: (value: string) => value is K, label: string) {
  return z
    .record(z.string().optional())
    .default({})
    .transform((record, ctx) => {
      const output: Partial<Record<K, string>> = {};
      for (const [key, value] of Object.entries(record)) {
        if (!isKey(key)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `Unknown ${label} "${key}".`,
          });
          continue;
        }
        const present = presentText(value);
        if (present !== undefined) {
          output[key] = present;
        }
      }
      return output;
    });
}

// ---------- Entities ----------

export const PromptImageSchema = z.object({
  id: nonEmptyString,
  data: ImageBytesSchema,
});

export const RelatedLinkSchema = z.object({
  id: nonEmptyString,
  title: z.string().default(""),
  url: nonEmptyString,
});

export const PresetSchema = z.object({
  id: nonEmptyString,
  kind: SectionKindSchema,
  name: nonEmptyString,
  text: nonEmptyString,
});

export const DefaultsMapSchema = keyedTextRecord(isDefaultKey, "default key");

export const PromptSchema = z.object({
  id: nonEmptyString,
  title: z.string().default(""),
  physicalDescription: optionalText,
  outfit: optionalText,
  pose: optionalText,
  environment: optionalText,
  lighting: optionalText,
  styleModifiers: optionalText,
  technicalModifiers: optionalText,
  negativePrompt: optionalText,
  additionalInfo: optionalText,
  presetMarkers: keyedTextRecord(isSectionKind, "section kind"),
  images: z.array(PromptImageSchema).default([]),
});

export const SceneCharacterSettingsSchema = z.object({
  physicalDescription: optionalText,
  outfit: optionalText,
  pose: optionalText,
  additionalInfo: optionalText,
  sourcePromptId: nonEmptyString.optional(),
  presetMarkers: keyedTextRecord(isCharacterSectionKind, "character section kind"),
});

export const ScenePromptSchema = z.object({
  id: nonEmptyString,
  title: z.string().default(""),
  environment: optionalText,
  lighting: optionalText,
  styleModifiers: optionalText,
  technicalModifiers: optionalText,
  negativePrompt: optionalText,
  additionalInfo: optionalText,
  characterSettings: z.record(SceneCharacterSettingsSchema).default({}),
  presetMarkers: keyedTextRecord(isSceneWideSectionKind, "scene section kind"),
  images: z.array(PromptImageSchema).default([]),
});

export const CharacterSchema = z.object({
  id: nonEmptyString,
  name: z.string(),
  bio: z.string().default(""),
  notes: z.string().default(""),
  prompts: z.array(PromptSchema).default([]),
  profileImage: ImageBytesSchema.optional(),
  standaloneImages: z.array(PromptImageSchema).default([]),
  links: z.array(RelatedLinkSchema).default([]),
  characterDefaults: DefaultsMapSchema,
  generatorOverride: nonEmptyString.optional(),
  themeOverride: nonEmptyString.optional(),
});

export const SceneSchema = z.object({
  id: nonEmptyString,
  name: z.string(),
  description: z.string().default(""),
  notes: z.string().default(""),
  characterIds: z.array(nonEmptyString).default([]),
  prompts: z.array(ScenePromptSchema).default([]),
  profileImage: ImageBytesSchema.optional(),
  standaloneImages: z.array(PromptImageSchema).default([]),
  links: z.array(RelatedLinkSchema).default([]),
  sceneDefaults: DefaultsMapSchema,
  generatorOverride: nonEmptyString.optional(),
  themeOverride: nonEmptyString.optional(),
});

export const LibrarySchema = z
  .object({
    version: z.literal(LIBRARY_VERSION).default(LIBRARY_VERSION),
    characters: z.array(CharacterSchema).default([]),
    scenes: z.array(SceneSchema).default([]),
    presets: z.array(PresetSchema).default([]),
    globalDefaults: DefaultsMapSchema,
    defaultGenerator: nonEmptyString.default(DEFAULT_GENERATOR),
  })
  .superRefine((library, ctx) => {
    reportDuplicateIds(library.characters, "characters", ctx);
    reportDuplicateIds(library.scenes, "scenes", ctx);
    reportDuplicateIds(library.presets, "presets", ctx);
  });

export type LibraryDocument = z.input<typeof LibrarySchema>;
export type CharacterDocument = z.input<typeof CharacterSchema>;
export type SceneDocument = z.input<typeof SceneSchema>;
export type PromptDocument = z.input<typeof PromptSchema>;
export type ScenePromptDocument = z.input<typeof ScenePromptSchema>;
export type PromptImageDocument = z.input<typeof PromptImageSchema>;

export function safeParseLibrary(
  input: unknown,
): z.SafeParseReturnType<LibraryDocument, Library> {
  return LibrarySchema.safeParse(input);
}

function reportDuplicateIds(
  items: ReadonlyArray<{ id: string }>,
  collection: string,
  ctx: z.RefinementCtx,
): void {
  const seen = new Set<string>();
  items.forEach((item, index) => {
    if (seen.has(item.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [collection, index, "id"],
        message: `Duplicate id "${item.id}".`,
      });
    }
    seen.add(item.id);
  });
}
