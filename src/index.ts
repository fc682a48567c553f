/**
 * Package entry point
 *
 * Re-exports the dice engine, the CoC sub-engine, the formatters and the
 * chat-command helpers. Executed directly (`node dist/src/index.js roll 2d6`),
 * it behaves like the CLI.
 *
 * @module index
 */
import { main } from './cli';

export * from './dice';
export { getReplyForText } from './handler';
export type { Reply, ReplyContext } from './handler';
export { executeRollCommand, parseRollCommand, runRollCommand, splitMessage } from './commands/roll';
export type { RollCommand, RollOutcome } from './commands/roll';
export { createRandomSource, fromUniform, defaultRandom } from './rng';
export type { RandomInt, RngMethod } from './rng';
export { runCLI } from './cli';

if (require.main === module) {
  void main();
}
