export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) {
    return "unknown";
  }

  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

interface FormatZodErrorOptions {
  heading?: string;
  /** Prepended to each issue path. Default: "--" */
  pathPrefix?: string;
}

/**
 * Format Zod validation issues as an indented list, one issue per line.
 */
export function formatZodError(
  error: { issues: Array<{ path: Array<string | number>; message: string }> },
  options: FormatZodErrorOptions = {},
): string {
  const { heading = "Validation error:", pathPrefix = "--" } = options;
  const lines = [heading];

  for (const issue of error.issues) {
    const path = issue.path.join(".");
    const prefix = path ? `  ${pathPrefix}${path}: ` : "  ";
    lines.push(`${prefix}${issue.message}`);
  }

  return lines.join("\n");
}
