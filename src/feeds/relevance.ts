/**
 * Trendwire — Relevance Filter
 *
 * Plain case-insensitive substring matching. Short keywords such as "ai"
 * also match inside longer words; that is accepted.
 */

export const AI_KEYWORDS = [
  'ai',
  'artificial intelligence',
  'machine learning',
  'ml',
  'deep learning',
  'neural network',
  'chatgpt',
  'gpt',
  'openai',
  'llm',
  'large language model',
  'transformer',
  'bert',
  'nlp',
  'computer vision',
  'reinforcement learning',
  'generative ai',
  'anthropic',
  'claude',
  'stable diffusion',
  'midjourney',
  'pytorch',
  'tensorflow',
  'hugging face',
  'langchain',
] as const;

export function isAiRelated(
  title: string,
  text: string | null | undefined,
  keywords: readonly string[] = AI_KEYWORDS
): boolean {
  const content = `${title} ${text ?? ''}`.toLowerCase();
  return keywords.some((keyword) => content.includes(keyword));
}
