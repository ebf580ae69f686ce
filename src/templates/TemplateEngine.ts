import fs from 'fs';
import path from 'path';
import type { SessionIdentity } from '../session/sessionIdentity.js';
import { TemplateNotFoundError } from './errors.js';
import { renderTemplateSource, type TemplateVariables } from './syntax.js';

export const REQUIRED_TEMPLATE_FILES = ['device.xml', 'present.html'] as const;

/** Directory-name marker for templates that carry an exfiltration DTD */
export const EXFIL_TEMPLATE_MARKER = 'xxe-exfil';

/** Body served in place of an optional template that is not in use */
export const PLACEHOLDER_BODY = '.';

export function templateVariablesFor(session: SessionIdentity): TemplateVariables {
  return Object.freeze({
    SMBServer: session.smbServer,
    LocalIP: session.localIp,
    LocalPort: String(session.localPort),
    SessionUSN: session.sessionUsn,
    RedirectURL: session.redirectUrl,
  });
}

function isMissing(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Renders the files of one template directory. The same variable set is used
 * for every render so descriptors and pages agree on identifiers.
 */
export class TemplateEngine {
  private readonly variables: TemplateVariables;

  constructor(
    public readonly templateDir: string,
    variables: TemplateVariables,
  ) {
    this.variables = Object.freeze({ ...variables });
  }

  get isExfilVariant(): boolean {
    return this.templateDir.includes(EXFIL_TEMPLATE_MARKER);
  }

  async render(filename: string): Promise<string> {
    const templatePath = path.join(this.templateDir, filename);

    let source: string;
    try {
      source = await fs.promises.readFile(templatePath, 'utf8');
    } catch (error) {
      if (isMissing(error)) {
        throw new TemplateNotFoundError(templatePath);
      }
      throw error;
    }

    return renderTemplateSource(source, this.variables, templatePath);
  }

  renderDeviceDescriptor(): Promise<string> {
    return this.render('device.xml');
  }

  /** service.xml is optional */
  async renderServiceDescriptor(): Promise<string> {
    if (!fs.existsSync(path.join(this.templateDir, 'service.xml'))) {
      return PLACEHOLDER_BODY;
    }
    return this.render('service.xml');
  }

  async renderPhishingPage(): Promise<string> {
    const content = await this.render('present.html');
    if (!content.toLowerCase().includes('<html')) {
      return `<html>\n${content}\n</html>`;
    }
    return content;
  }

  async renderExfilDtd(): Promise<string> {
    if (!this.isExfilVariant) {
      return PLACEHOLDER_BODY;
    }
    return this.render('data.dtd');
  }
}

/**
 * Throws TemplateNotFoundError unless the directory holds every required file.
 */
export function validateTemplateDir(templateDir: string): void {
  if (!fs.existsSync(templateDir) || !fs.statSync(templateDir).isDirectory()) {
    throw new TemplateNotFoundError(
      templateDir,
      `template directory does not exist: ${templateDir}`,
    );
  }

  for (const file of REQUIRED_TEMPLATE_FILES) {
    const filePath = path.join(templateDir, file);
    if (!fs.existsSync(filePath)) {
      throw new TemplateNotFoundError(
        filePath,
        `required template file not found: ${filePath}`,
      );
    }
  }
}

/**
 * Names of the valid template directories under the base directory.
 */
export function listTemplates(baseDir: string): string[] {
  if (!fs.existsSync(baseDir)) {
    return [];
  }

  const templates: string[] = [];
  const visit = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const fullPath = path.join(dir, entry.name);
      if (REQUIRED_TEMPLATE_FILES.every((file) => fs.existsSync(path.join(fullPath, file)))) {
        templates.push(path.relative(baseDir, fullPath).split(path.sep).join('/'));
      }
      visit(fullPath);
    }
  };
  visit(baseDir);

  return templates.sort();
}
