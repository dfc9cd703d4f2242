export * from './chat.module.js';
export * from './chat.service.js';
export * from './chat.errors.js';
export * from './chat.types.js';
export * from './conversation-turn.repository.js';
export * from './follow-up-query.js';
export * from './dto/chat-request.dto.js';
