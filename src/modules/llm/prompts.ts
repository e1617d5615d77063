/**
 * Prompt templates shared by the generation, HyDE and evaluation steps.
 */

export const CONTEXT_SEPARATOR = '\n\n---\n\n';

export const RAG_SYSTEM_PROMPT = `You are a helpful AI assistant. Answer the user's question based on the provided context.
If the context doesn't contain relevant information, say so clearly.
Be concise and accurate.`;

export function buildRagUserPrompt(question: string, context: string): string {
    return `Context:
${context}

Question: ${question}

Answer:`;
}

export const HYDE_SYSTEM_PROMPT = `You write short passages that could appear in technical documentation.
Given a question, write one passage of about 100 words that answers it as the documentation would.
Return ONLY the passage, no additional text.`;
