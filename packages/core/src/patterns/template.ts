/**
 * `{name}` placeholder templates used by fix commands, handler messages and
 * commit messages
 */

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Names referenced by a template, in order of first appearance
 */
export function templateFields(template: string): string[] {
  const fields: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name !== undefined && !fields.includes(name)) {
      fields.push(name);
    }
  }
  return fields;
}

/**
 * Substitute known placeholders. Unknown placeholders are left as written.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (placeholder, name: string) =>
    Object.hasOwn(values, name) ? (values[name] ?? '') : placeholder
  );
}
