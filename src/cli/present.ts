/**
 * Kryten CLI: Result Presentation
 *
 * One DispatchResult in, one line and an exit code out.
 */

import type { DispatchResult } from '../dispatch/types.js';
import {
  ExitCode,
  exitCodeFor,
  printFailure,
  printResult,
  type ExitCodeValue,
} from '../utils/output.js';

export interface RenderedResult {
  text: string;
  exitCode: ExitCodeValue;
}

export function render(result: DispatchResult): RenderedResult {
  return {
    text: result.summary,
    exitCode: result.ok ? ExitCode.SUCCESS : exitCodeFor(result.errorKind),
  };
}

/** The --json document for a result. */
export function toJson(result: DispatchResult): Record<string, unknown> {
  return {
    ok: result.ok,
    summary: result.summary,
    ...(!result.ok && { errorKind: result.errorKind }),
    ...(result.payload && { payload: result.payload }),
  };
}

/**
 * Write the result according to the output mode and return its exit code.
 * `help` is printed below a failure line in human mode.
 */
export async function emit(result: DispatchResult, help?: string): Promise<ExitCodeValue> {
  const { text, exitCode } = render(result);
  const { default: chalk, Chalk } = await import('chalk');
  const paint = isColorEnabled() ? chalk : new Chalk({ level: 0 });

  // The mark is the first character of every summary.
  const [mark, rest] = [text.slice(0, 1), text.slice(1)];

  if (result.ok) {
    printResult(toJson(result), () => {
      process.stdout.write(`${paint.green(mark)}${rest}\n`);
    });
  } else {
    printFailure(toJson(result), () => {
      process.stderr.write(`${paint.red(mark)}${rest}\n`);
      if (help) {
        process.stderr.write(`\n${help}\n`);
      }
    });
  }

  return exitCode;
}

function isColorEnabled(): boolean {
  return process.env.NO_COLOR === undefined || process.env.NO_COLOR === '';
}
