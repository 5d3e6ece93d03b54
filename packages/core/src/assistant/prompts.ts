import { ChatMessage } from '@termwise/shared';

const JSON_ONLY =
  'Reply with a single JSON object and nothing else: no Markdown fences, no text before or after it.';

const GENERATION_SYSTEM_PROMPT = `You translate plain-language requests into one shell command for bash or zsh.

${JSON_ONLY}

Schema:
{
  "command": "<the shell command>",
  "safety": "SAFE" | "ATTENTION",
  "explanation": "<one or two sentences on what the command does and why it got that rating>"
}

Rating:
- SAFE: read-only work such as listing, viewing, searching, navigation or help.
- ATTENTION: anything that modifies files or the system, touches the network, or needs elevated privileges.
When unsure, answer ATTENTION.

Prefer standard Unix utilities and output exactly the command to run.`;

const EXPLANATION_SYSTEM_PROMPT = `You explain shell commands to someone learning the command line.

${JSON_ONLY}

Schema:
{
  "explanation": [
    { "text": "<what this command or pipeline stage does>", "details": ["<one flag or argument each>"] }
  ]
}

Give each stage of a pipeline its own entry and put flag and option notes in "details".`;

export function buildGenerationMessages(query: string): ChatMessage[] {
  return [
    { role: 'system', content: GENERATION_SYSTEM_PROMPT },
    { role: 'user', content: `Request: ${query}` },
  ];
}

export function buildExplanationMessages(command: string): ChatMessage[] {
  return [
    { role: 'system', content: EXPLANATION_SYSTEM_PROMPT },
    { role: 'user', content: `Command: ${command}` },
  ];
}
