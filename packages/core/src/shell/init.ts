import fs from 'fs';
import path from 'path';
import { ExitCode, UsageError } from '@termwise/shared';

export const SUPPORTED_SHELLS = ['zsh', 'bash', 'fish'] as const;
export type SupportedShell = (typeof SUPPORTED_SHELLS)[number];

export function isSupportedShell(shell: string): shell is SupportedShell {
  return SUPPORTED_SHELLS.some((supported) => supported === shell);
}

export interface InitScriptOptions {
  /** Executable the script calls. Default: `termwise` */
  bin?: string;
  /** Name of the shell function the script defines. Default: `tw` */
  functionName?: string;
  /** Directory holding `termwise.<shell>` templates */
  templatesDir?: string;
}

// Same relative location from src/shell and dist/shell
export const TEMPLATES_DIR = path.join(__dirname, '..', '..', 'templates');

/**
 * Shell code defining a function that runs `generate` and puts the command in
 * the shell's input. Exit code {@link ExitCode.Attention} prints a review
 * warning first; other failures keep the diagnostics on stderr.
 *
 * @throws UsageError for shells other than zsh, bash and fish
 */
export function renderInitScript(shell: string, options: InitScriptOptions = {}): string {
  if (!isSupportedShell(shell)) {
    throw new UsageError(`unsupported shell: ${shell} (supported: ${SUPPORTED_SHELLS.join(', ')})`);
  }

  const templatePath = path.join(options.templatesDir ?? TEMPLATES_DIR, `termwise.${shell}`);
  const template = fs.readFileSync(templatePath, 'utf8');

  return template
    .replaceAll('{{BIN}}', options.bin ?? 'termwise')
    .replaceAll('{{FUNCTION}}', options.functionName ?? 'tw')
    .replaceAll('{{ATTENTION_CODE}}', String(ExitCode.Attention));
}
