import type { ParsedArgs } from '../parser.js';
import type { Output } from '../output.js';
import type { ControlScoreConfig } from '../../config/schema.js';

export interface CommandContext {
  args: ParsedArgs;
  output: Output;
  config: ControlScoreConfig;
  cwd: string;
  now?: Date; // clock override for compensating control expiry
}

export interface Command {
  name: string;
  description: string;
  usage: string;
  run(ctx: CommandContext): Promise<number>;
}

export const commands: Map<string, Command> = new Map();

export function registerCommand(cmd: Command): void {
  commands.set(cmd.name, cmd);
}

export function getCommand(name: string): Command | undefined {
  return commands.get(name);
}
