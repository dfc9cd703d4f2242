import { RagError } from '../common/index.js';

export class TemplateError extends RagError {
  constructor(templateId: string, message: string) {
    super('PROMPT_TEMPLATE_INVALID', 'input', `Template ${templateId}: ${message}`, {
      details: { templateId },
    });
    this.name = 'TemplateError';
  }
}
