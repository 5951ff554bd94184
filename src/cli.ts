import * as readline from 'readline';
import { RconClient } from './client';
import { DEFAULT_PORT } from './config';
import { ConnectionClosedError } from './errors';
import { logger } from './logger';

export interface CliSettings {
  host: string;
  port: number;
  password: string;
  /**
   * @description Command to run once; empty for an interactive prompt.
   * */
  command: string;
}

export const USAGE = 'Usage: rcon-console <host> [port] [command...]  (password from RCON_PASSWORD)';

/**
 * @description Read the CLI settings from `argv` (without the node and script entries) and the environment.
 * @throws {Error} On a missing host or password, with the usage line in the message.
 * */
export function parseArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliSettings {
  const [host, ...rest] = argv;
  if (!host) {
    throw new Error(USAGE);
  }

  let port = DEFAULT_PORT;
  if (rest.length > 0 && /^\d+$/.test(rest[0])) {
    port = parseInt(rest.shift() ?? '', 10);
  }

  const password = env.RCON_PASSWORD;
  if (!password) {
    throw new Error(`RCON_PASSWORD is not set\n${USAGE}`);
  }

  return { host, port, password, command: rest.join(' ') };
}

/**
 * Command line front end for RconClient.
 */
export class RconCLI {
  private readonly client: RconClient;
  private readonly settings: CliSettings;

  constructor(settings: CliSettings, client?: RconClient) {
    this.settings = settings;
    this.client = client ?? new RconClient(settings.host, { port: settings.port });
  }

  /**
   * @description Connect, then run the configured command or start the prompt.
   * */
  async start(): Promise<void> {
    try {
      await this.client.connect(this.settings.password);
      if (this.settings.command) {
        console.log(await this.client.command(this.settings.command));
      } else {
        await this.prompt();
      }
    } finally {
      await this.client.close();
    }
  }

  /**
   * @description Run one prompt line. Returns false when the session should end.
   * */
  async handleLine(input: string): Promise<boolean> {
    const line = input.trim();
    if (!line) return true;
    if (line === 'quit' || line === 'exit') return false;

    try {
      console.log(await this.client.command(line));
    } catch (err) {
      logger.error(`command failed: ${err instanceof Error ? err.message : String(err)}`);
      if (err instanceof ConnectionClosedError) return false;
    }
    return true;
  }

  private async prompt(): Promise<void> {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: 'rcon> ',
    });
    rl.prompt();
    try {
      for await (const input of rl) {
        if (!(await this.handleLine(input))) break;
        rl.prompt();
      }
    } finally {
      rl.close();
    }
  }
}
