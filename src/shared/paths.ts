import path from "node:path";

export const LIBRARY_ENV_VAR = "CASTBOOK_LIBRARY";
export const DEFAULT_LIBRARY_RELATIVE_PATH = path.join("castbook", "library.json");

/**
 * Library location, in order: `--library`, `CASTBOOK_LIBRARY`, then
 * `castbook/library.json` under the working directory.
 */
export function resolveLibraryPath(
  libraryFlag: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const fromEnv = env[LIBRARY_ENV_VAR]?.trim();
  const value = libraryFlag ?? (fromEnv ? fromEnv : DEFAULT_LIBRARY_RELATIVE_PATH);
  return path.resolve(cwd, value);
}

export function resolveOutputPath(
  outFlag: string,
  cwd: string = process.cwd(),
): string {
  const trimmed = outFlag.trim();
  if (!trimmed) {
    throw new Error("Output path must be a non-empty string.");
  }
  if (trimmed.includes("\0")) {
    throw new Error(`Output path "${outFlag}" contains a null byte.`);
  }
  return path.resolve(cwd, trimmed);
}
