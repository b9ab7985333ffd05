// ATC Phrase Relay - Schema issue formatting
// Turns zod issues into the one-line descriptions carried by ConfigError.

import type { ZodIssue } from "zod";

/** `["mappings", 2, "variants", 0]` → `mappings[2].variants[0]` */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}

export function describeIssue(issue: ZodIssue): string {
  if (issue.path.length === 0) return issue.message;
  return `"${formatIssuePath(issue.path)}" ${issue.message}`;
}

/** One line per issue, in schema order, without repeats. */
export function describeIssues(issues: readonly ZodIssue[]): string[] {
  return [...new Set(issues.map(describeIssue))];
}
