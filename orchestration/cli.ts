#!/usr/bin/env node
/**
 * pipeline-coord - command line front end of the coordination core
 *
 * Usage:
 *   pipeline-coord [--root <dir>] <group> <command> [args...]
 *
 * Every command prints one JSON payload on stdout:
 *   { "ok": true, "command": "state read", "result": ... }
 *   { "ok": false, "command": "state read", "error": { kind, code, message, details } }
 * Logs go to stderr.
 */

import { readFileSync, realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import {
  CoordinatorError,
  ERROR_KINDS,
  MergeStrategySchema,
  ValidationFailedError,
  exitCodeFor,
  loadConfig,
  toDiagnostic,
} from '../shared/src/index.js';
import { createCoordinator, type Coordinator } from './coordinator.js';
import { classifyError } from './errorRecovery.js';
import { StateMutationSchema } from './stateManager.js';
import { CrashMonitor, type MonitorStatus } from './crashProtection.js';
import type { CheckpointKind } from './checkpointStore.js';
import type { LockListing, LockMode } from './fileLock.js';
import { WorkspaceStatusSchema } from './worktreeIndex.js';

const VALUE_FLAGS = new Set(['root', 'depends-on', 'allowed-paths', 'status', 'content-file', 'kind']);
const BOOLEAN_FLAGS = new Set(['archive', 'force', 'help']);

// Exit code for a read that found corruption and recovered from it
const RECOVERED_EXIT_CODE = exitCodeFor(ERROR_KINDS.StateCorruption);

export class UsageError extends CoordinatorError {
  constructor(message: string) {
    super(message, { kind: ERROR_KINDS.Unknown, code: 'USAGE' });
    this.name = 'UsageError';
  }
}

export interface ParsedArgs {
  positionals: string[];
  values: Map<string, string>;
  switches: Set<string>;
}

export interface CliIO {
  stdout: (text: string) => void;
  /** Resolves when a long-running command should stop */
  waitForShutdown?: () => Promise<void>;
}

interface CommandResult {
  result: unknown;
  exitCode?: number;
  /** Printed verbatim instead of the JSON payload */
  text?: string;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const values = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith('--') || arg.length === 2) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (BOOLEAN_FLAGS.has(name)) {
      switches.add(name);
    } else if (VALUE_FLAGS.has(name)) {
      const value = eq === -1 ? argv[++i] : arg.slice(eq + 1);
      if (value === undefined || value === '') {
        throw new UsageError(`Missing value for --${name}`);
      }
      values.set(name, value);
    } else {
      throw new UsageError(`Unknown option --${name}`);
    }
  }
  return { positionals, values, switches };
}

function parseJsonArg(raw: string | undefined, what: string): unknown {
  if (raw === undefined) {
    throw new UsageError(`Missing ${what}`);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationFailedError(`${what} is not valid JSON`, [`${what}: ${error instanceof Error ? error.message : String(error)}`]);
  }
}

function parseNumberArg(raw: string | undefined, what: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new UsageError(`${what} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

function parseList(raw: string | undefined): string[] | undefined {
  return raw
    ?.split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function required(args: ParsedArgs, index: number, what: string): string {
  const value = args.positionals[index];
  if (value === undefined) {
    throw new UsageError(`Missing ${what}`);
  }
  return value;
}

function parseWith<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationFailedError(
      `Invalid ${what}`,
      parsed.error.issues.map((issue) => `${[what, ...issue.path].join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function formatLockTable(listing: LockListing[]): string {
  if (listing.length === 0) return 'No locks held';
  const rows = listing.map((entry) => [
    entry.record?.resourceName ?? entry.file,
    entry.record?.mode ?? '-',
    entry.record ? String(entry.record.holderProcessId) : '-',
    entry.ageMs === null ? '-' : `${Math.round(entry.ageMs / 1000)}s`,
    entry.status,
  ]);
  const header = ['RESOURCE', 'MODE', 'PID', 'AGE', 'STATUS'];
  const widths = header.map((h, col) => Math.max(h.length, ...rows.map((r) => (r[col] ?? '').length)));
  return [header, ...rows].map((row) => row.map((cell, col) => cell.padEnd(widths[col] ?? 0)).join('  ').trimEnd()).join('\n');
}

async function stateCommand(c: Coordinator, command: string, args: ParsedArgs): Promise<CommandResult> {
  const { state } = c;
  switch (command) {
    case 'init': {
      const outcome = await state.init();
      return { result: outcome, exitCode: outcome.status === 'recovered' || outcome.status === 'reset' ? RECOVERED_EXIT_CODE : 0 };
    }
    case 'read': {
      const outcome = await state.read();
      return { result: outcome, exitCode: outcome.status === 'recovered' || outcome.status === 'reset' ? RECOVERED_EXIT_CODE : 0 };
    }
    case 'write': {
      const mutation = parseWith(StateMutationSchema, parseJsonArg(args.positionals[0], 'mutation'), 'mutation');
      const outcome = await state.applyMutation(mutation, args.positionals[1] ?? 'cli-write');
      return { result: outcome };
    }
    case 'validate': {
      const report = state.validate();
      if (!report.valid) {
        throw new ValidationFailedError('State document is invalid', report.issues, { stateFile: state.filePath });
      }
      return { result: report };
    }
    case 'backup':
      return { result: state.backup(args.positionals[0] ?? 'manual') };
    case 'restore':
      return { result: await state.restore(args.positionals[0]) };
    case 'status':
      return { result: state.status() };
    case 'backups':
      return { result: state.listBackups() };
    case 'migrate':
      return { result: await state.migrate() };
    default:
      throw new UsageError(`Unknown state command "${command}"`);
  }
}

async function lockCommand(c: Coordinator, command: string, args: ParsedArgs): Promise<CommandResult> {
  const { locks } = c;
  switch (command) {
    case 'acquire': {
      const resource = required(args, 0, 'resource');
      const timeoutSeconds = parseNumberArg(args.positionals[1], 'timeoutSeconds');
      const mode = parseWith<LockMode>(z.enum(['exclusive', 'shared']), args.positionals[2] ?? 'exclusive', 'mode');
      const lease = await locks.acquire(resource, {
        mode,
        timeoutMs: timeoutSeconds === undefined ? undefined : timeoutSeconds * 1000,
        metadata: { via: 'cli' },
      });
      return { result: lease };
    }
    case 'release': {
      const resource = required(args, 0, 'resource');
      return { result: { resource, released: locks.releaseResource(resource) } };
    }
    case 'check':
      return { result: locks.check(required(args, 0, 'resource')) };
    case 'list': {
      const format = args.positionals[0] ?? 'json';
      const listing = locks.list();
      if (format === 'table') return { result: listing, text: formatLockTable(listing) };
      if (format !== 'json') throw new UsageError(`Unknown format "${format}" (json | table)`);
      return { result: listing };
    }
    case 'cleanup': {
      const minutes = parseNumberArg(args.positionals[0], 'maxAgeMinutes');
      return { result: { cleaned: locks.cleanup(minutes === undefined ? undefined : minutes * 60_000) } };
    }
    default:
      throw new UsageError(`Unknown lock command "${command}"`);
  }
}

async function recoveryCommand(c: Coordinator, command: string, args: ParsedArgs): Promise<CommandResult> {
  const { recovery, checkpoints } = c;
  switch (command) {
    case 'checkpoint': {
      const name = required(args, 0, 'name');
      const phase = required(args, 1, 'phase');
      const payload = args.positionals[2] === undefined ? null : parseJsonArg(args.positionals[2], 'payload');
      const kind = parseWith<CheckpointKind>(
        z.enum(['full-state', 'payload-only']),
        args.values.get('kind') ?? 'full-state',
        'kind'
      );
      return { result: await recovery.checkpoint(name, phase, payload, kind) };
    }
    case 'restore':
      return { result: await recovery.restore(required(args, 0, 'checkpointId')) };
    case 'list-checkpoints':
      return { result: checkpoints.list(args.positionals[0]) };
    case 'cleanup-checkpoints': {
      const days = parseNumberArg(args.positionals[0], 'days');
      return { result: { removed: checkpoints.cleanup(days) } };
    }
    case 'degrade': {
      const reason = required(args, 0, 'reason');
      const features = args.positionals.slice(1);
      if (features.length === 0) throw new UsageError('Name at least one feature to disable');
      return { result: await recovery.enterDegradedMode(reason, features) };
    }
    case 'recover-mode':
      return { result: await recovery.exitDegradedMode() };
    case 'error-log':
      return { result: recovery.errorLog(parseNumberArg(args.positionals[0], 'limit')) };
    case 'cleanup-temp': {
      const minutes = parseNumberArg(args.positionals[0], 'maxAgeMinutes');
      return { result: { removed: recovery.cleanupTempFiles(minutes === undefined ? undefined : minutes * 60_000) } };
    }
    case 'reset-config':
      return { result: recovery.resetConfig() };
    default:
      throw new UsageError(`Unknown recovery command "${command}"`);
  }
}

async function workspaceCommand(c: Coordinator, command: string, args: ParsedArgs): Promise<CommandResult> {
  const { workspaces } = c;
  switch (command) {
    case 'create':
      return {
        result: await workspaces.create(required(args, 0, 'taskKey'), args.positionals[1], {
          dependsOn: parseList(args.values.get('depends-on')),
          allowedPaths: parseList(args.values.get('allowed-paths')),
        }),
      };
    case 'status': {
      const name = args.positionals[0];
      return { result: name ? await workspaces.status(name) : await workspaces.summary() };
    }
    case 'validate':
      return { result: await workspaces.validate(required(args, 0, 'name')) };
    case 'merge': {
      const name = required(args, 0, 'name');
      const raw = args.positionals[1];
      const strategy = raw === undefined ? undefined : parseWith(MergeStrategySchema, raw, 'strategy');
      return { result: await workspaces.merge(name, strategy) };
    }
    case 'resolve': {
      const name = required(args, 0, 'name');
      const path = required(args, 1, 'path');
      const contentFile = args.values.get('content-file');
      if (contentFile !== undefined) {
        return { result: await workspaces.provideResolved(name, path, readFileSync(contentFile, 'utf-8')) };
      }
      const choice = required(args, 2, 'resolution (ours | theirs | --content-file <file>)');
      if (choice === 'ours') return { result: await workspaces.acceptOurs(name, path) };
      if (choice === 'theirs') return { result: await workspaces.acceptTheirs(name, path) };
      throw new UsageError(`Unknown resolution "${choice}" (ours | theirs | --content-file <file>)`);
    }
    case 'cleanup':
      return {
        result: await workspaces.cleanup(required(args, 0, 'name'), {
          archive: args.switches.has('archive'),
          force: args.switches.has('force'),
        }),
      };
    case 'cleanup-completed':
      return { result: await workspaces.cleanupCompleted({ archive: args.switches.has('archive') }) };
    case 'list': {
      const raw = args.values.get('status');
      const status = raw === undefined ? undefined : parseWith(WorkspaceStatusSchema, raw, 'status');
      return { result: await workspaces.list({ status }) };
    }
    case 'repair':
      return { result: await workspaces.repair() };
    case 'current':
      return { result: await workspaces.current(process.cwd()) };
    default:
      throw new UsageError(`Unknown workspace command "${command}"`);
  }
}

async function monitorCommand(c: Coordinator, command: string, args: ParsedArgs, io: CliIO): Promise<CommandResult> {
  switch (command) {
    case 'check':
      return { result: await new CrashMonitor(c).runCheck() };
    case 'start': {
      const seconds = parseNumberArg(args.positionals[0], 'intervalSeconds');
      const monitor = new CrashMonitor(c, { intervalMs: seconds === undefined ? undefined : seconds * 1000 });
      await monitor.start();
      await (io.waitForShutdown ?? waitForSignal)();
      await monitor.stop();
      const status: MonitorStatus = monitor.status();
      return { result: status };
    }
    default:
      throw new UsageError(`Unknown monitor command "${command}"`);
  }
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

export const USAGE = `pipeline-coord [--root <dir>] <group> <command> [args...]

state     init | read | write <mutation-json> [label] | validate | backup [label]
          restore [selector] | status | backups | migrate
lock      acquire <resource> [timeoutSeconds] [exclusive|shared] | release <resource>
          check <resource> | list [json|table] | cleanup [maxAgeMinutes]
recovery  checkpoint <name> <phase> <payload-json> [--kind full-state|payload-only]
          restore <checkpointId> | list-checkpoints [name] | cleanup-checkpoints [days]
          degrade <reason> <features...> | recover-mode
          error-log [limit] | cleanup-temp [maxAgeMinutes] | reset-config
workspace create <taskKey> [basePoint] [--depends-on a,b] [--allowed-paths p,q]
          status [name] | validate <name> | merge <name> [fast-forward|three-way|squash]
          resolve <name> <path> ours|theirs|--content-file <file>
          cleanup <name> [--archive] [--force] | cleanup-completed [--archive]
          list [--status s] | repair | current
monitor   check | start [intervalSeconds]`;

/**
 * Run one command and print its payload.
 * @returns the process exit code
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO = { stdout: (text) => process.stdout.write(text + '\n') }
): Promise<number> {
  let commandName = argv.filter((a) => !a.startsWith('--')).slice(0, 2).join(' ');
  let coordinator: Coordinator | undefined;
  try {
    const args = parseArgs(argv);
    const [group, command, ...rest] = args.positionals;
    if (args.switches.has('help') || group === undefined || group === 'help') {
      io.stdout(USAGE);
      return 0;
    }
    if (command === undefined) {
      throw new UsageError(`Missing command for "${group}"`);
    }
    commandName = `${group} ${command}`;

    const config = loadConfig({ rootDir: args.values.get('root') });
    // Leases taken from the command line belong to the invoking shell
    coordinator = createCoordinator(config, group === 'lock' ? { holderPid: process.ppid } : {});
    const commandArgs: ParsedArgs = { ...args, positionals: rest };

    let outcome: CommandResult;
    switch (group) {
      case 'state':
        outcome = await stateCommand(coordinator, command, commandArgs);
        break;
      case 'lock':
        outcome = await lockCommand(coordinator, command, commandArgs);
        break;
      case 'recovery':
        outcome = await recoveryCommand(coordinator, command, commandArgs);
        break;
      case 'workspace':
        outcome = await workspaceCommand(coordinator, command, commandArgs);
        break;
      case 'monitor':
        outcome = await monitorCommand(coordinator, command, commandArgs, io);
        break;
      default:
        throw new UsageError(`Unknown command group "${group}"`);
    }

    io.stdout(outcome.text ?? JSON.stringify({ ok: true, command: commandName, result: outcome.result }, null, 2));
    return outcome.exitCode ?? 0;
  } catch (error) {
    const kind = classifyError(error);
    if (coordinator && !(error instanceof UsageError)) {
      await coordinator.recovery.handleError(commandName, error, { repair: false });
    }
    io.stdout(JSON.stringify({ ok: false, command: commandName, error: toDiagnostic(error, kind) }, null, 2));
    return exitCodeFor(kind);
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`Fatal error: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}
