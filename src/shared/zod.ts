import type { ZodError } from "zod";

export function formatIssuePath(pathItems: Array<string | number>): string {
  if (pathItems.length === 0) {
    return "$";
  }

  return pathItems
    .map((item, index) => {
      if (typeof item === "number") {
        return `[${item}]`;
      }
      return index === 0 ? item : `.${item}`;
    })
    .join("");
}

export function describeFirstIssue(error: ZodError): { where: string; what: string } {
  const firstIssue = error.issues.at(0);
  return {
    where: firstIssue ? formatIssuePath(firstIssue.path) : "$",
    what: firstIssue ? firstIssue.message : "Schema validation failed.",
  };
}
