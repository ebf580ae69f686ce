import { TemplateSyntaxError } from './errors.js';

export type TemplateVariableName =
  | 'SMBServer'
  | 'LocalIP'
  | 'LocalPort'
  | 'SessionUSN'
  | 'RedirectURL';

export type TemplateVariables = Readonly<Record<TemplateVariableName, string>>;

const TEMPLATE_VARIABLE_NAMES: readonly TemplateVariableName[] = [
  'SMBServer',
  'LocalIP',
  'LocalPort',
  'SessionUSN',
  'RedirectURL',
];

/**
 * Placeholders operators write in template files, mapped to the variable
 * each one stands for.
 */
export const OPERATOR_PLACEHOLDERS: Readonly<Record<string, TemplateVariableName>> = {
  SMB_SERVER: 'SMBServer',
  smb_server: 'SMBServer',
  local_ip: 'LocalIP',
  local_port: 'LocalPort',
  session_usn: 'SessionUSN',
  redirect_url: 'RedirectURL',
};

const OPERATOR_TOKEN = new RegExp(
  `\\$\\$|\\$(${Object.keys(OPERATOR_PLACEHOLDERS).join('|')})`,
  'g',
);

function isVariableName(name: string): name is TemplateVariableName {
  return (TEMPLATE_VARIABLE_NAMES as readonly string[]).includes(name);
}

/**
 * First phase: `$local_ip` becomes `{{LocalIP}}`, `$$` becomes a literal `$`.
 * A single left-to-right pass, so `$$local_ip` stays the literal text
 * `$local_ip`.
 */
export function toNativeSyntax(source: string): string {
  return source.replace(OPERATOR_TOKEN, (_match: string, token?: string) => {
    if (token === undefined) {
      return '$';
    }
    return `{{${OPERATOR_PLACEHOLDERS[token]}}}`;
  });
}

function lineAt(text: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

/**
 * Second phase: execute `{{ Name }}` actions (a leading dot is tolerated)
 * against the variable set.
 */
export function executeTemplate(
  native: string,
  variables: TemplateVariables,
  templatePath: string,
): string {
  let output = '';
  let cursor = 0;

  while (cursor < native.length) {
    const open = native.indexOf('{{', cursor);
    if (open === -1) {
      output += native.slice(cursor);
      break;
    }

    const close = native.indexOf('}}', open + 2);
    if (close === -1) {
      throw new TemplateSyntaxError(
        templatePath,
        'unclosed action',
        lineAt(native, open),
      );
    }

    const expression = native.slice(open + 2, close).trim();
    const name = expression.startsWith('.') ? expression.slice(1) : expression;
    if (name === '') {
      throw new TemplateSyntaxError(templatePath, 'missing value for action', lineAt(native, open));
    }
    if (!isVariableName(name)) {
      throw new TemplateSyntaxError(
        templatePath,
        `unknown variable "${expression}"`,
        lineAt(native, open),
      );
    }

    output += native.slice(cursor, open) + variables[name];
    cursor = close + 2;
  }

  return output;
}

export function renderTemplateSource(
  source: string,
  variables: TemplateVariables,
  templatePath: string,
): string {
  return executeTemplate(toNativeSyntax(source), variables, templatePath);
}
