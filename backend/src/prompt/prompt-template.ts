import { TemplateError } from './prompt.errors.js';
import { PROMPT_SLOTS, type PromptSlot, type PromptTemplate } from './prompt.types.js';

const SLOT_REFERENCE = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function isPromptSlot(name: string): name is PromptSlot {
  return PROMPT_SLOTS.some((slot) => slot === name);
}

export function slotsIn(text: string): Set<string> {
  const found = new Set<string>();
  for (const match of text.matchAll(SLOT_REFERENCE)) {
    if (match[1]) {
      found.add(match[1]);
    }
  }
  return found;
}

/**
 * Validates and freezes a template. Without an explicit `requiredSlots` list
 * every slot the text references becomes required.
 */
export function createPromptTemplate(
  id: string,
  text: string,
  requiredSlots?: readonly string[],
): PromptTemplate {
  const referenced = slotsIn(text);

  const unknown = [...referenced].filter((name) => !isPromptSlot(name));
  if (unknown.length > 0) {
    throw new TemplateError(id, `unknown slot(s) ${unknown.map((name) => `{${name}}`).join(', ')}`);
  }

  const required: PromptSlot[] = [];
  for (const name of requiredSlots ?? [...referenced]) {
    if (!isPromptSlot(name)) {
      throw new TemplateError(id, `unknown required slot {${name}}`);
    }
    if (!referenced.has(name)) {
      throw new TemplateError(id, `required slot {${name}} is missing from the text`);
    }
    required.push(name);
  }

  return Object.freeze({
    id,
    text,
    requiredSlots: Object.freeze(required),
  });
}
