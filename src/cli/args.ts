import { isSectionKind, SECTION_KINDS, type SectionKind } from "../model/sections.js";
import { CliError } from "../shared/errors.js";

export function readArgValue(argv: string[], name: string): string | undefined {
  const exact = `--${name}`;
  const prefix = `${exact}=`;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
    if (arg === exact) {
      return argv[index + 1];
    }
  }

  return undefined;
}

export function requireArgValue(argv: string[], name: string): string {
  const value = readArgValue(argv, name);
  if (value === undefined || value.trim() === "") {
    throw new CliError(`Missing required flag --${name}.`, {
      code: "missing_flag",
      exitCode: 1,
    });
  }
  return value;
}

/**
 * An optional flag: `undefined` when it is absent, but once it is given it
 * must carry a non-blank value.
 */
export function readOptionalArgValue(argv: string[], name: string): string | undefined {
  const exact = `--${name}`;
  const given = argv.some((arg) => arg === exact || arg.startsWith(`${exact}=`));
  return given ? requireArgValue(argv, name) : undefined;
}

export function parseBooleanArg(value: string, flagName: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "y"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "n"].includes(normalized)) {
    return false;
  }
  throw new CliError(
    `Invalid boolean value "${value}" for ${flagName}. Use true or false.`,
    { code: "invalid_boolean_flag", exitCode: 1 },
  );
}

export function parseSectionKindArg(value: string, flagName: string): SectionKind {
  const trimmed = value.trim();
  if (isSectionKind(trimmed)) {
    return trimmed;
  }
  throw new CliError(
    `Invalid section kind "${value}" for ${flagName}. Use one of: ${SECTION_KINDS.join(", ")}.`,
    { code: "invalid_section_kind", exitCode: 1 },
  );
}

export interface OwnerArg {
  kind: "character" | "scene";
  reference: string;
}

/** `--character` or `--scene`; naming both is an error. */
export function readOwnerArg(argv: string[]): OwnerArg | undefined {
  const character = readArgValue(argv, "character");
  const scene = readArgValue(argv, "scene");
  if (character !== undefined && scene !== undefined) {
    throw new CliError("Use either --character or --scene, not both.", {
      code: "conflicting_flags",
      exitCode: 1,
    });
  }
  if (character !== undefined) {
    return { kind: "character", reference: character };
  }
  if (scene !== undefined) {
    return { kind: "scene", reference: scene };
  }
  return undefined;
}

export function requireOwnerArg(argv: string[]): OwnerArg {
  const owner = readOwnerArg(argv);
  if (owner === undefined) {
    throw new CliError("Missing required flag --character or --scene.", {
      code: "missing_flag",
      exitCode: 1,
    });
  }
  return owner;
}
