/**
 * Escaping of text placed inside Mermaid diagrams
 */

const ALWAYS_ESCAPED: Record<string, string> = {
  ':': '#58;',
  '<': '#60;',
  '>': '#62;',
  '|': '#124;',
  '"': '#34;',
  '#': '#35;'
};

// Axis category labels break on anything that looks like list or string syntax
const AXIS_LABEL_ESCAPED: Record<string, string> = {
  '/': '#47;',
  '\\': '#92;',
  '(': '#40;',
  ')': '#41;',
  '[': '#91;',
  ']': '#93;',
  '{': '#123;',
  '}': '#125;',
  '&': '#38;',
  "'": '#39;',
  '`': '#96;',
  ';': '#59;',
  '=': '#61;',
  '+': '#43;',
  ',': '#44;'
};

/**
 * Escape a string for use in a Mermaid title, label or series name.
 * Non-ASCII characters become `#<codepoint>;` entities.
 *
 * @param isAxisLabel Escape the characters that break axis category lists as well
 */
export function escapeMermaidString(input: string | null | undefined, isAxisLabel: boolean = false): string {
  if (!input) return '';

  return input
    .replace(/\r/g, '')
    .replace(/\n/g, ' ')
    .replace(/[^]/gu, char => {
      const entity = ALWAYS_ESCAPED[char] ?? (isAxisLabel ? AXIS_LABEL_ESCAPED[char] : undefined);
      if (entity !== undefined) {
        return entity;
      }
      const codePoint = char.codePointAt(0) ?? 63;
      return codePoint > 0x7f ? `#${codePoint};` : char;
    });
}

/**
 * Escape and join category labels for an `x-axis [...]` list
 */
export function escapeMermaidAxisLabels(labels: readonly string[]): string {
  return labels.map(label => `"${escapeMermaidString(label, true)}"`).join(', ');
}

export function truncateAndEscapeMermaid(input: string, maxLength: number = 100, isAxisLabel: boolean = false): string {
  const truncated = input.length > maxLength ? input.substring(0, maxLength - 3) + '...' : input;
  return escapeMermaidString(truncated, isAxisLabel);
}
