/**
 * Prompt template utilities for consistent LLM interactions.
 */

export interface PromptTemplate {
  system?: string;
  template: string;
  variables: string[];
}

/**
 * Build a prompt by substituting variables into a template.
 * Single pass: substituted values are never scanned for placeholders.
 */
function buildPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? (variables[key] ?? '') : placeholder,
  );
}

/**
 * Create a reusable prompt template.
 */
export function createPromptTemplate(
  template: string,
  options?: { system?: string },
): PromptTemplate {
  const variableRegex = /\{(\w+)\}/g;
  const variables: string[] = [];
  let match;
  while ((match = variableRegex.exec(template)) !== null) {
    if (!variables.includes(match[1])) {
      variables.push(match[1]);
    }
  }

  return {
    system: options?.system,
    template,
    variables,
  };
}

/**
 * Execute a prompt template with given variables.
 */
export function executeTemplate(
  template: PromptTemplate,
  variables: Record<string, string>,
): { prompt: string; system?: string } {
  const missingVars = template.variables.filter((v) => !(v in variables));
  if (missingVars.length > 0) {
    throw new Error(`Missing template variables: ${missingVars.join(', ')}`);
  }

  return {
    prompt: buildPrompt(template.template, variables),
    system: template.system,
  };
}

/**
 * Cut content to a character budget, marking the cut.
 */
export function truncateForPrompt(content: string, maxChars: number): string {
  if (content.length <= maxChars) return content;
  return `${content.slice(0, maxChars)}\n<!-- truncated ${content.length - maxChars} characters -->`;
}
