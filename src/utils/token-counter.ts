// Token estimation for context metadata
// Approximate: ~4 characters per token for English text. Providers report
// real usage; this estimate is what the context window cost before sending.

const CHARS_PER_TOKEN = 4;
const MESSAGE_OVERHEAD_TOKENS = 4; // role and formatting

export function countTokens(text: string): number {
  if (!text) return 0;

  const baseTokens = Math.ceil(text.length / CHARS_PER_TOKEN);

  // Tokens often break on whitespace and punctuation
  const whitespaceBoost = (text.match(/\s+/g) || []).length * 0.1;
  const specialCharBoost = (text.match(/[^\w\s]/g) || []).length * 0.05;

  return Math.ceil(baseTokens + whitespaceBoost + specialCharBoost);
}

export function countMessagesTokens(messages: ReadonlyArray<{ content: string }>): number {
  let total = 0;
  for (const msg of messages) {
    total += MESSAGE_OVERHEAD_TOKENS + countTokens(msg.content);
  }
  return total;
}
