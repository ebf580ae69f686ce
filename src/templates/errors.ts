export class TemplateError extends Error {
  constructor(message: string, public templatePath: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

/** The template file (or directory) does not exist */
export class TemplateNotFoundError extends TemplateError {
  constructor(templatePath: string, message = `template file not found: ${templatePath}`) {
    super(message, templatePath);
    this.name = 'TemplateNotFoundError';
  }
}

/** The template exists but cannot be parsed or executed */
export class TemplateSyntaxError extends TemplateError {
  constructor(templatePath: string, detail: string, public line?: number) {
    super(
      `failed to render template ${templatePath}${line !== undefined ? `:${line}` : ''}: ${detail}`,
      templatePath,
    );
    this.name = 'TemplateSyntaxError';
  }
}
