export const YES_NO_SYSTEM_PROMPT = `You assess the coverage of a news outlet.

Use ONLY the provided article excerpts.
Do not rely on what you know about the outlet.
Answer the question about how the outlet covers the topic.
Respond ONLY in valid JSON.

Output schema:
{
  "answer": "yes" | "no"
}

Rules:
- Answer "yes" only when the excerpts clearly support it.
- Return JSON only.`;

export const STANCE_SYSTEM_PROMPT = `You assess the coverage of a news outlet.

Use ONLY the provided article excerpts.
Do not rely on what you know about the outlet.
Decide which side of the topic the coverage leans toward.
Respond ONLY in valid JSON.

Output schema:
{
  "stance": "left" | "right"
}

Rules:
- Pick the side the excerpts lean toward, even when the lean is slight.
- Return JSON only.`;

export function buildQuestionPrompt(
  topicTitle: string,
  question: string,
  excerpts: string[],
): string {
  return [
    `Topic: ${topicTitle}`,
    `Question: ${question}`,
    '',
    'Article excerpts:',
    ...excerpts.map((excerpt, index) => `[${index + 1}] ${excerpt}`),
  ].join('\n');
}

export function buildStancePrompt(
  topicTitle: string,
  leftPosition: string,
  rightPosition: string,
  excerpts: string[],
): string {
  return [
    `Topic: ${topicTitle}`,
    `Left position: ${leftPosition}`,
    `Right position: ${rightPosition}`,
    '',
    'Article excerpts:',
    ...excerpts.map((excerpt, index) => `[${index + 1}] ${excerpt}`),
  ].join('\n');
}
