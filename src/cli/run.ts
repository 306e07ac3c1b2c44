/**
 * Kryten CLI: Invocation Runner
 *
 * parse -> load config -> dispatch once -> close transport -> render.
 * Every failure is turned into a result line and an exit code here; nothing
 * below this point calls process.exit().
 */

import { parseCommand, type ParseOutcome } from '../commands/parse.js';
import { loadConfig } from '../config/loader.js';
import type { EffectiveConfig } from '../config/types.js';
import { dispatch, failureResult } from '../dispatch/dispatcher.js';
import type { DispatchResult } from '../dispatch/types.js';
import { createNatsTransport, type Transport } from '../transport/nats.js';
import { CliError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { ExitCode, isInteractive, type ExitCodeValue } from '../utils/output.js';
import { applyGlobalOptions, applyOutputFlags } from './global-options.js';
import { emit } from './present.js';

const log = createLogger('CLI');

export interface RunDependencies {
  /** Create the transport for this invocation. It must not connect yet. */
  openTransport(config: EffectiveConfig): Transport;
}

const defaultDependencies: RunDependencies = {
  openTransport: (config) => createNatsTransport(config),
};

export async function run(
  argv: readonly string[],
  deps: RunDependencies = defaultDependencies
): Promise<ExitCodeValue> {
  let outcome: ParseOutcome;
  try {
    outcome = parseCommand(argv);
  } catch (error) {
    if (!(error instanceof CliError)) throw error;
    applyOutputFlags(argv);
    return emit(failureResult(error.message, error.kind), error.help);
  }

  if (outcome.kind === 'info') {
    process.stdout.write(outcome.text);
    return ExitCode.SUCCESS;
  }

  const { command, options } = outcome;
  applyGlobalOptions(options);

  let config: EffectiveConfig;
  try {
    config = loadConfig(options.config, { channel: options.channel, domain: options.domain });
  } catch (error) {
    if (error instanceof CliError) return emit(failureResult(error.message, error.kind));
    throw error;
  }

  log.info('Dispatching', { command: command.kind, channel: config.channel, domain: config.domain });

  const transport = deps.openTransport(config);
  let result: DispatchResult;
  try {
    result = await withSpinner(`Sending to ${config.channel}...`, () =>
      dispatch(command, config, transport.send)
    );
  } finally {
    await closeTransport(transport);
  }

  return emit(result);
}

async function withSpinner<T>(text: string, task: () => Promise<T>): Promise<T> {
  if (!isInteractive()) return task();

  const ora = (await import('ora')).default;
  const spinner = ora({ text, stream: process.stderr }).start();
  try {
    return await task();
  } finally {
    spinner.stop();
  }
}

/** A failed close does not change the outcome of a send that already flushed. */
async function closeTransport(transport: Transport): Promise<void> {
  try {
    await transport.close();
  } catch (error) {
    log.warn('Failed to close connection', { reason: errorMessage(error) });
  }
}
