/**
 * Standardized error formatting for CLI commands.
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

/**
 * Lines of a standardized error message, without printing anything.
 */
export function formatError(title: string, nextSteps?: string[]): string[] {
  const lines = [`✗ ${title}`];
  if (nextSteps && nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines;
}

/**
 * Print a standardized error message and exit.
 *
 * @param title - Main error message (should be under 80 chars)
 * @param nextSteps - Optional array of actionable suggestions
 * @returns never - always calls process.exit(1)
 *
 * @example
 * exitWithError('Config error: layerMap must be an object, got array', [
 *   'Fix .demeter-lint/ config or delete it to use defaults'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  for (const line of formatError(title, nextSteps)) {
    console.error(line);
  }
  process.exit(1);
}
