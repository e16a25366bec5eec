export interface PromptParts {
  instruction: string;
  globalContext: string;
  examples: string[];
  query: string;
}

/**
 * Sections, in order and separated by a newline: instruction, global
 * context, `[EXAMPLES]`, `[QUERY]`. Empty sections are left out.
 */
export function renderPrompt(parts: PromptParts): string {
  const sections: string[] = [];
  if (parts.instruction) sections.push(parts.instruction);
  const context = parts.globalContext.trim();
  if (context) sections.push(context);
  if (parts.examples.length > 0) sections.push(`[EXAMPLES]\n${parts.examples.join('\n')}`);
  sections.push(`[QUERY]\n${parts.query}`);
  return sections.join('\n');
}
