import { InvalidArgumentException } from '../../common/exceptions';

export type TemplateFunction = (
  value: string,
  error: string,
  exponent: string,
  units: string
) => string;

/**
 * Output template: either a pattern with positional slots `{0}`..`{3}`
 * (value, error, exponent, units) or a callback receiving the same four strings.
 * `{{` and `}}` in a pattern are literal braces.
 */
export type Template =
  | { readonly kind: 'string'; readonly pattern: string }
  | { readonly kind: 'function'; readonly render: TemplateFunction };

export function stringTemplate(pattern: string): Template {
  const template: Template = { kind: 'string', pattern };
  return Object.freeze(template);
}

export function functionTemplate(render: TemplateFunction): Template {
  const template: Template = { kind: 'function', render };
  return Object.freeze(template);
}

export const SIUNITX_TEMPLATE = stringTemplate('\\SI{{{0} \\pm {1} e{2}}}{{{3}}}');
export const SIUNITX_VALUE_TEMPLATE = stringTemplate('\\SI{{{0} e{2}}}{{{3}}}');
export const SIUNITX_ERROR_TEMPLATE = stringTemplate('\\SI{{{1} e{2}}}{{{3}}}');
export const NUM_TEMPLATE = stringTemplate('\\num{{{0} \\pm {1} e{2}}}');
export const NUM_VALUE_TEMPLATE = stringTemplate('\\num{{{0} e{2}}}');
export const NUM_ERROR_TEMPLATE = stringTemplate('\\num{{{1} e{2}}}');
export const NATURAL_TEMPLATE = stringTemplate('({0} ± {1}) x 10^{2} {3}');

// Used by FormattedValue#toString
export const PLAIN_TEMPLATE = functionTemplate((value, error, exponent) =>
  exponent === '0' ? `${value} ± ${error}` : `(${value} ± ${error})e${exponent}`
);

export const BUILT_IN_TEMPLATES = {
  SIUNITX: SIUNITX_TEMPLATE,
  SIUNITX_VALUE: SIUNITX_VALUE_TEMPLATE,
  SIUNITX_ERROR: SIUNITX_ERROR_TEMPLATE,
  NUM: NUM_TEMPLATE,
  NUM_VALUE: NUM_VALUE_TEMPLATE,
  NUM_ERROR: NUM_ERROR_TEMPLATE,
  NATURAL: NATURAL_TEMPLATE
} as const;

export type BuiltInTemplateName = keyof typeof BUILT_IN_TEMPLATES;

export function isBuiltInTemplateName(name: string): name is BuiltInTemplateName {
  return Object.prototype.hasOwnProperty.call(BUILT_IN_TEMPLATES, name);
}

export const BUILT_IN_TEMPLATE_NAMES = Object.keys(BUILT_IN_TEMPLATES).filter(isBuiltInTemplateName);

export function renderTemplate(
  template: Template,
  value: string,
  error: string,
  exponent: string,
  units: string
): string {
  switch (template.kind) {
    case 'string':
      return interpolate(template.pattern, [value, error, exponent, units]);
    case 'function':
      return template.render(value, error, exponent, units);
  }
}

function interpolate(pattern: string, slots: readonly string[]): string {
  let output = '';
  let index = 0;

  while (index < pattern.length) {
    const char = pattern[index];

    if (char === '{') {
      if (pattern[index + 1] === '{') {
        output += '{';
        index += 2;
        continue;
      }

      const close = pattern.indexOf('}', index);
      if (close === -1) {
        throw new InvalidArgumentException(
          `Unclosed "{" at position ${index} in template "${pattern}"`,
          'MALFORMED_TEMPLATE'
        );
      }

      const field = pattern.slice(index + 1, close);
      if (!/^\d+$/.test(field)) {
        throw new InvalidArgumentException(
          `Template slots must be numeric, got "{${field}}" in template "${pattern}"`,
          'MALFORMED_TEMPLATE'
        );
      }

      const slot = Number(field);
      if (slot >= slots.length) {
        throw new InvalidArgumentException(
          `Template slot {${field}} is out of range; slots are 0 to ${slots.length - 1}`,
          'INVALID_TEMPLATE_SLOT'
        );
      }

      output += slots[slot];
      index = close + 1;
      continue;
    }

    if (char === '}') {
      if (pattern[index + 1] !== '}') {
        throw new InvalidArgumentException(
          `Single "}" at position ${index} in template "${pattern}"`,
          'MALFORMED_TEMPLATE'
        );
      }
      output += '}';
      index += 2;
      continue;
    }

    output += char;
    index += 1;
  }

  return output;
}
