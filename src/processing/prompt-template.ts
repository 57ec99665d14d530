/**
 * Brace-style prompt templates: `{name}` is a field, `{{` and `}}` are
 * literal braces. Field values are inserted verbatim.
 */

export class PromptTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptTemplateError';
  }
}

const FIELD_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function renderPromptTemplate(template: string, values: Record<string, string>): string {
  let out = '';
  let i = 0;

  while (i < template.length) {
    const ch = template[i];

    if (ch === '{') {
      if (template[i + 1] === '{') {
        out += '{';
        i += 2;
        continue;
      }
      const close = template.indexOf('}', i + 1);
      if (close === -1) {
        throw new PromptTemplateError(`Single '{' encountered in template at position ${i}`);
      }
      const field = template.slice(i + 1, close);
      if (!FIELD_NAME.test(field)) {
        throw new PromptTemplateError(`Invalid placeholder '{${field}}' at position ${i}`);
      }
      const value = values[field];
      if (value === undefined) {
        throw new PromptTemplateError(`Unknown placeholder '{${field}}'`);
      }
      out += value;
      i = close + 1;
      continue;
    }

    if (ch === '}') {
      if (template[i + 1] === '}') {
        out += '}';
        i += 2;
        continue;
      }
      throw new PromptTemplateError(`Single '}' encountered in template at position ${i}`);
    }

    out += ch;
    i++;
  }

  return out;
}
