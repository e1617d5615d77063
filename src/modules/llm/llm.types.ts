/**
 * Chat message
 */
export interface ChatMessage {
    role: 'user' | 'assistant' | 'system';
    content: string;
}

export interface CompletionOptions {
    temperature?: number;
    maxTokens?: number;
    model?: string;
    json?: boolean;
}
