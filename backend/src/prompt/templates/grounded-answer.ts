import { createPromptTemplate } from '../prompt-template.js';

export const GROUNDED_ANSWER_TEMPLATE_ID = 'grounded-answer';

export const groundedAnswerTemplate = createPromptTemplate(
  GROUNDED_ANSWER_TEMPLATE_ID,
  [
    'You answer questions using only the context passages below.',
    'Each passage starts with a marker such as [chunk:<id> source:<source> doc:<document>].',
    'Cite the chunk ids you rely on in square brackets, e.g. [chunk:abc123].',
    'If the context does not contain the answer, say that the available documents do not cover it.',
    'Answer in the language of the question. Give the conclusion first, then the supporting details.',
    '',
    '=== Conversation so far ===',
    '{history}',
    '',
    '=== Context ===',
    '{context}',
    '',
    '=== Question ===',
    '{query}',
  ].join('\n'),
  ['query', 'context'],
);
