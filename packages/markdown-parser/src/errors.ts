import type { ZodIssue } from "zod";

export class MarkdownParserError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised while merging configuration, before any document is parsed. */
export class InvalidConfigurationError extends MarkdownParserError {
  constructor(
    readonly key: string,
    readonly issues: readonly ZodIssue[],
    message = `Invalid configuration option "${key}"`,
  ) {
    super(message);
  }

  static fromIssues(rootKey: string, issues: readonly ZodIssue[]): InvalidConfigurationError {
    const paths = issues.map((issue) => formatIssuePath(rootKey, issue));
    const details = issues.map((issue, i) => `"${paths[i]}": ${issue.message}`).join("; ");
    return new InvalidConfigurationError(paths[0] ?? rootKey, issues, `Invalid configuration: ${details}`);
  }
}

export class EnvironmentFrozenError extends MarkdownParserError {
  constructor(action: string) {
    super(`Cannot ${action} once the environment has been used for parsing`);
  }
}

function formatIssuePath(rootKey: string, issue: ZodIssue): string {
  const segments = [rootKey, ...issue.path.map(String)];
  if (issue.code === "unrecognized_keys") segments.push(...issue.keys);
  return segments.join(".");
}
