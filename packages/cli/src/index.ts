/**
 * ephemera-ssh CLI
 *
 * Usage:
 *   ephemera-ssh [--config <file>] [options]
 *
 * Options:
 *   --config <file>      YAML configuration (target, policy, google)
 *   --command <cmd>      Run one command and exit with its exit code
 *   --instance <id>      Instance name (overrides target.instance_id)
 *   --zone <zone>        Zone (overrides target.zone)
 *   --project <id>       Project id (overrides target.project_id)
 *   --log-level <level>  trace|debug|info|warn|error|fatal|silent (default: info)
 */

import { once } from 'events';
import {
  ConnectionOrchestrator,
  ConfigurationError,
  EphemeraError,
  describeError,
  loadConfig,
  logger,
  parseConfig,
  setLogLevel,
  type ActiveSession,
  type ConnectionPolicyInput,
  type ConnectionTarget,
  type EphemeraConfig,
} from '@ephemera/core';
import { createGoogleAdapters } from '@ephemera/gcp';
import { GcloudIapTunnel, Ssh2KeyPairGenerator, Ssh2ShellClient } from '@ephemera/ssh';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CliArgs {
  configPath?: string;
  command?: string;
  instance?: string;
  zone?: string;
  project?: string;
  logLevel?: LogLevel;
  help?: boolean;
}

export const USAGE = `
ephemera-ssh v0.1.0

Usage:
  ephemera-ssh [--config <file>] [options]

Options:
  --config <file>      YAML configuration (target, policy, google)
  --command <cmd>      Run one command and exit with its exit code
  --instance <id>      Instance name (overrides target.instance_id)
  --zone <zone>        Zone (overrides target.zone)
  --project <id>       Project id (overrides target.project_id)
  --log-level <level>  trace|debug|info|warn|error|fatal|silent (default: info)
  --help, -h           Show this help message

Examples:
  # Open a shell on an instance
  ephemera-ssh --config ephemera.yaml --instance build-runner-1

  # Run a command through an IAP tunnel configured in ephemera.yaml
  ephemera-ssh --config ephemera.yaml --command "uptime"
`;

const VALUE_OPTIONS = ['--config', '--command', '--instance', '--zone', '--project', '--log-level'];

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
      continue;
    }

    if (!VALUE_OPTIONS.includes(arg)) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }
    const value = argv[i + 1];
    if (value === undefined) {
      throw new ConfigurationError(`Option ${arg} requires a value`);
    }
    i++;

    switch (arg) {
      case '--config':
        args.configPath = value;
        break;
      case '--command':
        args.command = value;
        break;
      case '--instance':
        args.instance = value;
        break;
      case '--zone':
        args.zone = value;
        break;
      case '--project':
        args.project = value;
        break;
      case '--log-level': {
        const level = LOG_LEVELS.find(candidate => candidate === value);
        if (!level) {
          throw new ConfigurationError(`Invalid log level: ${value}`);
        }
        args.logLevel = level;
        break;
      }
    }
  }

  return args;
}

/**
 * Command-line target flags win over the config file
 */
export function applyOverrides(config: EphemeraConfig, args: CliArgs): EphemeraConfig {
  const target: ConnectionTarget = { ...config.target };
  if (args.instance) {
    target.instance_id = args.instance;
  }
  if (args.zone) {
    target.zone = args.zone;
  }
  if (args.project) {
    target.project_id = args.project;
  }
  return { ...config, target };
}

export interface SessionSource {
  obtainSession(target: ConnectionTarget, policy: ConnectionPolicyInput): Promise<ActiveSession>;
}

/**
 * Wire the orchestrator to Google Cloud and ssh2
 */
export async function createOrchestrator(config: EphemeraConfig): Promise<ConnectionOrchestrator> {
  const google = await createGoogleAdapters(config.google, config.policy.impersonation_identity);
  return new ConnectionOrchestrator({
    directory: google.directory,
    identity: google.identity,
    authorization: google.authorization,
    keys: new Ssh2KeyPairGenerator(),
    shell: new Ssh2ShellClient(),
    tunnels: new GcloudIapTunnel(),
  });
}

/** process.stdin, or any readable without a TTY */
export type CliInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export interface CliIo {
  stdin: CliInput;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface RunOptions {
  io?: CliIo;
  sessions?: (config: EphemeraConfig) => Promise<SessionSource>;
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const io = options.io ?? { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr };
  const sessions = options.sessions ?? createOrchestrator;

  try {
    const args = parseArgs(argv);
    if (args.help) {
      io.stdout.write(USAGE);
      return 0;
    }
    if (args.logLevel) {
      setLogLevel(args.logLevel);
    }

    const loaded = args.configPath ? await loadConfig(args.configPath) : parseConfig({});
    const config = applyOverrides(loaded, args);

    const source = await sessions(config);
    const session = await source.obtainSession(config.target, config.policy);
    try {
      if (args.command !== undefined) {
        return await runCommand(session, args.command, io);
      }
      await bridgeShell(session, io);
      return 0;
    } finally {
      await session.close();
    }
  } catch (error) {
    logger.error({ err: describeError(error) }, '[cli] Failed');
    io.stderr.write(`${error instanceof EphemeraError ? error.message : describeError(error)}\n`);
    return 1;
  }
}

async function runCommand(session: ActiveSession, command: string, io: CliIo): Promise<number> {
  const result = await session.exec(command);
  io.stdout.write(result.stdout);
  io.stderr.write(result.stderr);
  return result.exit_code ?? 1;
}

async function bridgeShell(session: ActiveSession, io: CliIo): Promise<void> {
  const channel = await session.shell();
  const { stdin } = io;
  const raw = stdin.isTTY === true;
  if (raw) {
    stdin.setRawMode?.(true);
  }

  stdin.pipe(channel);
  channel.pipe(io.stdout, { end: false });
  try {
    await once(channel, 'close');
  } finally {
    stdin.unpipe(channel);
    if (raw) {
      stdin.setRawMode?.(false);
    }
    stdin.pause();
  }
}
