/**
 * Prompt text for answer generation.
 */

/**
 * Fixed instructions placed at the top of the system message. The packed
 * forum passages follow after a blank line.
 */
export const SYSTEM_PROMPT = `You are a teaching assistant who answers questions using posts from the course discussion forum and any images the user attaches.
Base your answer on the forum context below. If it does not contain the answer, say that you do not have enough information.
When images are attached, describe what is relevant in them and use it in your answer.
Do not invent facts, links or deadlines.

Context:`;

/**
 * System message content: instructions alone, or instructions, a blank
 * line and the packed context.
 */
export function buildSystemMessage(contextText: string, systemPrompt: string = SYSTEM_PROMPT): string {
  return contextText.length > 0 ? `${systemPrompt}\n\n${contextText}` : systemPrompt;
}
