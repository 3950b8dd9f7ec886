// src/self-test.ts
import { bridgeLogger } from './logger.js';
import { SELF_TEST_COMMANDS } from './constants/constants.js';
import { printable } from './utils/utils.js';
import type { QueryDispatcher } from './query-dispatcher.js';
import type { SelfTestCommand, SelfTestResult } from './types/bridge-types.js';

const logger = bridgeLogger.createLogger('SelfTest');

/**
 * Runs the interface check through the dispatcher, one command at a time.
 * A failing step is recorded and the sequence goes on.
 */
export async function runSelfTest(
  dispatcher: QueryDispatcher,
  commands: ReadonlyArray<SelfTestCommand> = SELF_TEST_COMMANDS
): Promise<SelfTestResult[]> {
  const results: SelfTestResult[] = [];
  logger.info(`Running ${commands.length} interface checks`);

  for (const { label, command } of commands) {
    try {
      const reply = await dispatcher.dispatch(command);
      logger.info(`${label}: ${printable(reply.framed)}`);
      results.push({ label, command, ok: true, reply });
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`${label} failed: ${error.message}`);
      results.push({ label, command, ok: false, error });
    }
  }

  const failed = results.filter(result => !result.ok).length;
  if (failed > 0) {
    logger.warn(`Interface check finished with ${failed} of ${results.length} steps failing`);
  } else {
    logger.info('Interface check passed');
  }
  return results;
}
