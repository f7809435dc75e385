import { InvalidDocumentError } from './errors';
import type { ConversionPrompt, TextCompletionProvider } from './types';

const FENCE = '```';

const SYSTEM_PROMPT =
  'You are a technical documentation expert who converts documentation into concise rule files for LLMs to follow. ' +
  'Summarize the documentation into direct, concise rules. ' +
  'For references, always use full markdown links like [Link Text](https://url.com). ' +
  'Never add triple backticks (```) at the start or end of the file. ' +
  'Preserve all code examples and their formatting.';

const RULE_FILE_STRUCTURE = `
rulefile structure:

---
description: Short description of the rule's purpose
globs: **/*.rs
alwaysApply: true
---
# Rule Title

Main content explaining the rule with markdown formatting.

1. Step-by-step instructions
2. Code examples
3. Guidelines
4. Best practices
5. Full markdown links at the end, one per line with descriptions

Example:
\`\`\`typescript
// Good example
function goodExample() {
  // Implementation following guidelines
}

// Bad example
function badExample() {
  // Implementation not following guidelines
}
\`\`\`

For more information:
- [Official Documentation](https://docs.example.com)
- [API Reference](https://api.example.com)
`;

export function validateDocContent(content: string): boolean {
  if (!content.trim()) return false;
  return content.split('\n').some((line) => line.trim() !== '');
}

/**
 * Build the conversion prompt.
 * The document is embedded verbatim as the last part of the user message.
 */
export function buildPrompt(docContent: string): ConversionPrompt {
  const user = `Convert the following documentation into a rule file following this structure:

${RULE_FILE_STRUCTURE}

Remember to be very concise. This is for LLMs to read.

Important formatting rules:
1. Use full markdown links at the end (e.g. [Link Text](https://url.com))
2. Do not add triple backticks at the start or end of the file
3. Keep code blocks within the content only
4. Preserve all code examples and their formatting
5. Maintain the logical structure of the documentation
6. Include all relevant code snippets and examples

Here's the documentation to convert:

${docContent}`;

  return { system: SYSTEM_PROMPT, user };
}

// Only the outermost three characters on each side; inner fences stay.
export function cleanTripleBackticks(content: string): string {
  let out = content;
  if (out.startsWith(FENCE)) out = out.slice(FENCE.length);
  if (out.endsWith(FENCE)) out = out.slice(0, -FENCE.length);
  return out;
}

export function cleanLeadingBlankLines(content: string): string {
  const lines = content.split(/\r\n|\r|\n/);
  // a trailing terminator doesn't start another line
  if (lines.length && lines[lines.length - 1] === '') lines.pop();

  const start = lines.findIndex((line) => line.trim() !== '');
  if (start === -1) return '';
  return lines.slice(start).join('\n');
}

export function postprocess(raw: string): string {
  return cleanLeadingBlankLines(cleanTripleBackticks(raw));
}

export async function convertDocToRule(
  docContent: string,
  provider: TextCompletionProvider
): Promise<string> {
  if (!validateDocContent(docContent)) {
    throw new InvalidDocumentError();
  }
  const reply = await provider.complete(buildPrompt(docContent));
  return postprocess(reply);
}
