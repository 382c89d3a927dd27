/**
 * Template variable interpolation utility
 *
 * Replaces {{variableName}} patterns in text with values from a variables object.
 * Unmatched variables are left unchanged.
 */
export function interpolateVariables(
  text: string,
  variables?: Record<string, string>,
  escape: (value: string) => string = (value) => value
): string {
  if (!variables || !text) return text;
  const values = variables;

  return text.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    return Object.hasOwn(values, key) ? escape(values[key]) : match;
  });
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}
