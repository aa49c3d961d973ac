export const RAG_ANSWER_PROMPT = (contexts: string[], question: string) => `You are a helpful AI assistant. Answer the question based on the provided context.

Context:
${contexts.join('\n')}

Question: ${question}

Provide a clear, accurate answer based solely on the context above. If the context doesn't contain enough information, say so.

Answer:`;

export const NO_ANSWER_GENERATED = 'No answer generated';
