import { ModelRequest, ModelResponse, ProviderCapabilities } from '@termwise/shared';

import { ProviderAdapter } from '../adapter';
import { AdapterContext } from '../types';

const CANNED_COMMANDS: Record<string, string> = {
  'list files': 'ls -la',
  'list all files': 'ls -la',
  'delete everything': 'rm -rf /',
  'install vim': 'sudo apt install vim',
  'check disk usage': 'df -h',
  'show processes': 'ps aux',
  'find python files': "find . -name '*.py'",
};

const CANNED_EXPLANATIONS: Record<string, string> = {
  'ls -la': 'List all files and directories in long format, including hidden files',
  'rm -rf /': 'DANGEROUS: Recursively remove all files starting from root directory',
  'sudo apt install vim': 'Install vim text editor using apt package manager with sudo privileges',
  'df -h': 'Display filesystem disk usage in human-readable format',
  'ps aux': 'Show all running processes with detailed information',
  "find . -name '*.py'": 'Find all Python files in current directory and subdirectories',
};

const RISKY_SUBSTRINGS = [
  'rm -rf',
  'sudo',
  'dd',
  'mkfs',
  'fdisk',
  'systemctl start',
  'systemctl stop',
  'apt install',
  'yum install',
  'pacman -S',
];

export interface FakeAdapterOptions {
  /** Returned for every request instead of the canned answers */
  staticResponse?: string;
}

/**
 * Answers without a network. Replies are shaped like real model output (JSON
 * text) so the full parsing path runs.
 */
export class FakeAdapter implements ProviderAdapter {
  constructor(private readonly options: FakeAdapterOptions = {}) {}

  id(): string {
    return 'fake';
  }

  model(): string {
    return 'fake';
  }

  capabilities(): ProviderCapabilities {
    return {
      supportsJsonMode: true,
      requiresApiKey: false,
      latencyClass: 'fast',
    };
  }

  async generate(request: ModelRequest, context: AdapterContext): Promise<ModelResponse> {
    const task = request.metadata?.task ?? 'generate';
    const input = (request.metadata?.input ?? lastUserMessage(request)).trim();

    await context.logger.debug(`fake provider answering ${task} for: ${input}`);

    if (task === 'explain') {
      return { text: JSON.stringify({ explanation: [{ text: this.explanationFor(input), details: [] }] }) };
    }

    const command = this.commandFor(input);
    return {
      text: JSON.stringify({
        command,
        safety: looksRisky(command) ? 'ATTENTION' : 'SAFE',
        explanation: CANNED_EXPLANATIONS[command] ?? `Mock explanation for command: ${command}`,
      }),
    };
  }

  private commandFor(query: string): string {
    if (this.options.staticResponse) return this.options.staticResponse;
    return CANNED_COMMANDS[query.toLowerCase()] ?? `echo 'Mock command for: ${query}'`;
  }

  private explanationFor(command: string): string {
    if (this.options.staticResponse) return this.options.staticResponse;
    return CANNED_EXPLANATIONS[command] ?? `Mock explanation for command: ${command}`;
  }
}

/** Substring check, so `add` trips the `dd` entry too. */
export function looksRisky(command: string): boolean {
  return RISKY_SUBSTRINGS.some((fragment) => command.includes(fragment));
}

function lastUserMessage(request: ModelRequest): string {
  const users = request.messages.filter((m) => m.role === 'user');
  return users[users.length - 1]?.content ?? '';
}
