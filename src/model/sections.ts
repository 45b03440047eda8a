/**
 * Prompt sections and the default keys they are stored under.
 *
 * `SECTION_TABLE` is the only place the pairing is written down; both lookup
 * directions are derived from it.
 */
const SECTION_TABLE = [
  ["physicalDescription", "physicalDescription"],
  ["outfit", "outfit"],
  ["pose", "pose"],
  ["environment", "environment"],
  ["lighting", "lighting"],
  ["style", "style"],
  ["technical", "technical"],
  ["negative", "negative"],
] as const;

export type SectionKind = (typeof SECTION_TABLE)[number][0];
export type DefaultKey = (typeof SECTION_TABLE)[number][1];

export const SECTION_KINDS: readonly SectionKind[] = SECTION_TABLE.map(([kind]) => kind);
export const DEFAULT_KEYS: readonly DefaultKey[] = SECTION_TABLE.map(([, key]) => key);

const DEFAULT_KEY_BY_KIND = new Map<SectionKind, DefaultKey>(
  SECTION_TABLE.map(([kind, key]) => [kind, key]),
);
const KIND_BY_DEFAULT_KEY = new Map<DefaultKey, SectionKind>(
  SECTION_TABLE.map(([kind, key]) => [key, kind]),
);

export interface SectionDisplay {
  label: string;
  placeholder: string;
  /** Opaque icon tag; renderers map it to their own glyphs. */
  icon: string;
}

const SECTION_DISPLAY: Record<SectionKind, SectionDisplay> = {
  physicalDescription: {
    label: "Physical Description",
    placeholder: "Describe physical features...",
    icon: "person.fill",
  },
  outfit: {
    label: "Outfit",
    placeholder: "Describe clothing and accessories...",
    icon: "tshirt.fill",
  },
  pose: {
    label: "Pose",
    placeholder: "Describe pose and expression...",
    icon: "figure.stand",
  },
  environment: {
    label: "Environment",
    placeholder: "Describe the setting and background...",
    icon: "mountain.2.fill",
  },
  lighting: {
    label: "Lighting",
    placeholder: "Describe lighting conditions...",
    icon: "sun.max.fill",
  },
  style: {
    label: "Style Modifiers",
    placeholder: "Add artistic style modifiers...",
    icon: "paintbrush.fill",
  },
  technical: {
    label: "Technical Modifiers",
    placeholder: "Add technical parameters...",
    icon: "slider.horizontal.3",
  },
  negative: {
    label: "Negative Prompt",
    placeholder: "Elements to exclude...",
    icon: "xmark.circle.fill",
  },
};

export function isSectionKind(value: string): value is SectionKind {
  return SECTION_KINDS.some((kind) => kind === value);
}

export function isDefaultKey(value: string): value is DefaultKey {
  return DEFAULT_KEYS.some((key) => key === value);
}

export function defaultKeyFor(kind: SectionKind): DefaultKey {
  const key = DEFAULT_KEY_BY_KIND.get(kind);
  if (key === undefined) {
    throw new Error(`Unknown section kind "${kind}".`);
  }
  return key;
}

export function sectionKindFor(key: DefaultKey): SectionKind {
  const kind = KIND_BY_DEFAULT_KEY.get(key);
  if (kind === undefined) {
    throw new Error(`Unknown default key "${key}".`);
  }
  return kind;
}

export function sectionDisplay(kind: SectionKind): SectionDisplay {
  return SECTION_DISPLAY[kind];
}

export function sectionLabel(kind: SectionKind): string {
  return SECTION_DISPLAY[kind].label;
}
