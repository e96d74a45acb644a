/**
 * Markdown code-fence stripping for model output.
 */

// A language tag only counts as one when a line break follows it, or when it
// is `sql` followed by a space; otherwise the letters are the query itself.
const LEADING_FENCE_RE = /^```(?:[a-z0-9_+-]*[ \t]*\r?\n|sql[ \t]+|[ \t]*)/i;
const TRAILING_FENCE_RE = /\r?\n?```\s*$/;

/**
 * Remove a leading ``` or ```sql fence (any case) and a trailing ``` fence,
 * then trim. Text without fences is only trimmed.
 */
export function stripCodeFences(text: string): string {
  return text.trim().replace(LEADING_FENCE_RE, '').replace(TRAILING_FENCE_RE, '').trim();
}
