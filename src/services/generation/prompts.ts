/**
 * Card generation prompts
 */

export const SYSTEM_PROMPT = 'You write concise, high-quality spaced repetition flashcards from articles.';

export const BASE_CARD_PROMPT = `You are a spaced repetition tutor turning the article below into Anki flashcards.

Write two kinds of cards.

Cloze cards
- Find the central thesis and the key supporting claims (justifications, logical steps, contrasts).
- State each claim as one short, direct sentence.
- Cloze the key terms, distinctions or causal links, e.g. {{c1::term}}; use {{c2::...}} for a second deletion in the same sentence.
- Each deletion is 1 to 5 words and makes sense on its own.
- Leave out examples, metaphors, quotes and trivia.
- Aim for 2 to 10 cloze cards.

Basic cards
- Capture definitions, statistics, distinctions or cause-effect relationships the author relies on.
- One short question, one short answer.
- Aim for 2 to 10 basic cards.

If the argument is implicit, infer what the author is trying to convey. Skip anything incidental.

Output format
- First a line containing only CLOZE, followed by the cloze cards.
- Then a line containing only BASIC, followed by the basic cards.
- One card per line, fields separated by semicolons:
  - Cloze: sentence with {{c1::deletion}} ; optional extra context ;
  - Basic: question ; answer ;
- Output only the cards.`;

/**
 * Full user prompt: base instructions, optional extra instructions, then
 * the article text.
 */
export function buildCardPrompt(articleText: string, customPrompt?: string): string {
  const extra = customPrompt?.trim();
  const instructions = extra
    ? `${BASE_CARD_PROMPT}\n\nAdditional instructions from the user:\n${extra}`
    : BASE_CARD_PROMPT;
  return `${instructions}\n\nArticle content:\n${articleText}`;
}
