import { Inject, Injectable } from '@nestjs/common';
import { countTokens, truncateToTokens } from '../common/index.js';
import { RagSettingsService } from '../config/index.js';
import type { RetrievedChunk } from '../retrieval/index.js';
import { TemplateError } from './prompt.errors.js';
import {
  PROMPT_TEMPLATES_TOKEN,
  type BuildPromptOptions,
  type BuiltPrompt,
  type ConversationMessage,
  type PromptSlot,
  type PromptTemplate,
} from './prompt.types.js';

const SLOT_SUBSTITUTION = /\{(query|context|history)\}/g;

const EMPTY_CONTEXT = '(no context passages were retrieved)';
const EMPTY_HISTORY = '(none)';

export function provenanceMarker(chunk: RetrievedChunk): string {
  return `[chunk:${chunk.chunkId} source:${chunk.source} doc:${chunk.documentId}]`;
}

function renderHistory(history: readonly ConversationMessage[]): string {
  if (history.length === 0) {
    return EMPTY_HISTORY;
  }
  return history
    .map(
      (message) =>
        `${message.role === 'user' ? 'User' : 'Assistant'}: ${message.content.trim()}`,
    )
    .join('\n');
}

/**
 * Assembles prompts from registered templates. Output depends only on the
 * arguments, so identical retrievals always produce identical prompt text.
 */
@Injectable()
export class PromptService {
  constructor(
    @Inject(PROMPT_TEMPLATES_TOKEN)
    private readonly templates: ReadonlyMap<string, PromptTemplate>,
    private readonly settings: RagSettingsService,
  ) {
    settings.addCheck(({ prompt }) =>
      templates.has(prompt.templateId)
        ? null
        : `prompt.templateId: "${prompt.templateId}" is not a registered template (${[...templates.keys()].join(', ')})`,
    );
  }

  getTemplate(id: string = this.settings.current().prompt.templateId): PromptTemplate {
    const template = this.templates.get(id);
    if (!template) {
      throw new TemplateError(id, 'not registered');
    }
    return template;
  }

  templateIds(): string[] {
    return [...this.templates.keys()];
  }

  buildPrompt(
    query: string,
    results: readonly RetrievedChunk[],
    template: PromptTemplate,
    options: BuildPromptOptions = {},
  ): BuiltPrompt {
    const trimmedQuery = query.trim();
    if (template.requiredSlots.includes('query') && trimmedQuery.length === 0) {
      throw new TemplateError(template.id, 'required slot {query} has no value');
    }

    const budget =
      options.tokenBudget ?? this.settings.current().prompt.contextTokenBudget;

    const parts: string[] = [];
    const includedChunkIds: string[] = [];
    let remaining = Math.max(budget, 0);
    let truncated = false;

    for (const chunk of results) {
      const marker = provenanceMarker(chunk);
      const markerTokens = countTokens(marker);
      const textTokens = countTokens(chunk.text);

      if (markerTokens + textTokens <= remaining) {
        parts.push(`${marker}\n${chunk.text.trim()}`);
        includedChunkIds.push(chunk.chunkId);
        remaining -= markerTokens + textTokens;
        continue;
      }

      truncated = true;
      const room = remaining - markerTokens;
      if (room > 0) {
        parts.push(`${marker}\n${truncateToTokens(chunk.text, room)}`);
        includedChunkIds.push(chunk.chunkId);
      }
      break;
    }

    const context = parts.join('\n\n');
    const values: Record<PromptSlot, string> = {
      query: trimmedQuery,
      context: context.length > 0 ? context : EMPTY_CONTEXT,
      history: renderHistory(options.history ?? []),
    };

    // one pass, so slot-like text inside a value is never substituted again
    const text = template.text.replace(
      SLOT_SUBSTITUTION,
      (_match, slot: PromptSlot) => values[slot],
    );

    return {
      text,
      templateId: template.id,
      includedChunkIds,
      truncated,
      contextTokens: countTokens(context),
    };
  }
}
