export const DEFAULT_QUESTION = "List all entity names.";

const CONTEXT_SEPARATOR = "\n\n";

export function resolveQuestion(args: string[]): string {
  return args.join(" ") || DEFAULT_QUESTION;
}

export function buildContext(blocks: string[]): string {
  return blocks.join(CONTEXT_SEPARATOR);
}

export function buildPrompt(context: string, question: string): string {
  return `${context}${CONTEXT_SEPARATOR}${question}`;
}
