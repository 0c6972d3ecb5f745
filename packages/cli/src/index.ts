/**
 * @modelbridge/cli
 *
 * CLI tool for modelbridge.
 */

export { embedCommand, type EmbedCommandOptions } from './commands/embed';
export { chatCommand, type ChatCommandOptions } from './commands/chat';
export { checkCommand, type CheckCommandOptions } from './commands/check';
