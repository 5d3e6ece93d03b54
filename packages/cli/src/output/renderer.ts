import pc from 'picocolors';
import { AppError } from '@termwise/shared';
import { ClassificationResult, Rule, RuleTable, SafetyLevel, toExitCode } from '@termwise/safety';

export type Colors = Pick<typeof pc, 'bold' | 'dim' | 'green' | 'red' | 'yellow' | 'cyan'>;

/** Colors unless NO_COLOR is set or the terminal cannot show them. */
export function colorsFor(env: NodeJS.ProcessEnv): Colors {
  return pc.createColors(env.NO_COLOR === undefined && pc.isColorSupported);
}

/**
 * stdout carries results only (the bare command for `generate`); notices and
 * errors go to stderr.
 */
export class OutputRenderer {
  constructor(
    private readonly isJson: boolean,
    private readonly colors: Colors = pc,
  ) {}

  command(command: string): void {
    console.log(command);
  }

  text(text: string): void {
    console.log(text.replace(/\n$/, ''));
  }

  notice(message: string): void {
    console.error(`\n${this.colors.cyan(message)}\n`);
  }

  verdict(command: string, result: ClassificationResult): void {
    const exitCode = toExitCode(result.level);
    if (this.isJson) {
      console.log(JSON.stringify({ command, ...result, exitCode }, null, 2));
      return;
    }

    const label =
      result.level === SafetyLevel.Attention
        ? this.colors.yellow(this.colors.bold('ATTENTION'))
        : this.colors.green(this.colors.bold('SAFE'));
    const rule = result.ruleId ? ` (rule ${result.ruleId})` : '';
    console.log(`${label} ${command}`);
    console.log(`  ${this.colors.bold('Reason:')} ${result.reason}`);
    console.log(`  ${this.colors.bold('Source:')} ${result.source}${rule}`);
  }

  rules(table: RuleTable): void {
    if (this.isJson) {
      console.log(
        JSON.stringify(
          { attention: table.attention.map(describeRule), safe: table.safe.map(describeRule) },
          null,
          2,
        ),
      );
      return;
    }

    console.log(this.colors.bold(`Attention rules (${table.attention.length}, checked first):`));
    table.attention.forEach((rule) => console.log(this.ruleLine(rule)));
    console.log(this.colors.bold(`\nSafe rules (${table.safe.length}):`));
    table.safe.forEach((rule) => console.log(this.ruleLine(rule)));
    console.log(this.colors.dim('\nCommands matching no rule are treated as safe.'));
  }

  error(error: unknown, debug = false): void {
    const message = error instanceof Error ? error.message : String(error);
    console.error(this.colors.red(`Error: ${message}`));
    if (error instanceof AppError && error.details) {
      const details =
        typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2);
      console.error(`  Details: ${details}`);
    }
    if (debug && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${error.stack}`);
    }
  }

  private ruleLine(rule: Rule): string {
    return `  ${rule.id.padEnd(24)} ${rule.category.padEnd(28)} ${this.colors.dim(rule.pattern.source)}`;
  }
}

function describeRule(rule: Rule) {
  return {
    id: rule.id,
    category: rule.category,
    anchor: rule.anchor,
    pattern: rule.pattern.source,
  };
}
