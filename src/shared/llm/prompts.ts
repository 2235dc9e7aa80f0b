/**
 * LLM Prompts
 *
 * Common prompt utilities and templates for LLM interactions.
 */

/**
 * A labelled block of source material embedded in a prompt
 */
export interface PromptSection {
  label: string;
  body: string;
}

/**
 * Build a structured prompt with clear instructions
 */
export function buildStructuredPrompt(
  task: string,
  sections: PromptSection[],
  instructions: string[],
  outputFormat?: string
): string {
  let prompt = `${task}\n\n`;

  for (const section of sections) {
    prompt += `--- ${section.label} ---\n${section.body}\n\n`;
  }

  if (instructions.length > 0) {
    prompt += 'INSTRUCTIONS:\n';
    instructions.forEach((instruction, i) => {
      prompt += `${i + 1}. ${instruction}\n`;
    });
    prompt += '\n';
  }

  if (outputFormat) {
    prompt += `OUTPUT FORMAT:\n${outputFormat}\n`;
  }

  return prompt;
}

/**
 * Normalize text for inclusion in prompts
 */
export function escapePromptText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')  // Normalize line endings
    .replace(/\r/g, '\n')    // Normalize line endings
    .trim();
}
