#!/usr/bin/env npx tsx

/**
 * Command-line front end: `npm run wallet -- <command> [args]`
 */

import process from 'node:process';
import { pathToFileURL } from 'node:url';

import { ConfigLoader, type WalletConfig } from './config/config-loader.ts';
import { Wallet, type WalletDependencies } from './core/wallet.ts';
import { BroadcastError, isWalletError } from './errors/index.ts';
import { type FeeTier, isFeeTier } from './interfaces/fee.interface.ts';

export type CommandName = 'create' | 'mnemonic' | 'send' | 'balance' | 'address' | 'network' | 'reset' | 'help';

const COMMAND_ALIASES: Record<string, CommandName> = {
  create: 'create',
  c: 'create',
  mnemonic: 'mnemonic',
  m: 'mnemonic',
  send: 'send',
  s: 'send',
  balance: 'balance',
  b: 'balance',
  address: 'address',
  a: 'address',
  network: 'network',
  n: 'network',
  reset: 'reset',
  r: 'reset',
  help: 'help',
  '--help': 'help',
  '-h': 'help',
};

export const USAGE = [
  'Usage: wallet <command> [args]',
  '',
  'Commands:',
  '  create, c                               Generate and store a new mnemonic',
  '  mnemonic, m <words...>                  Restore from an existing mnemonic',
  '  send, s <to> <amount> [--fee-tier T]    Send satoshis (T: low|medium|high)',
  '  balance, b                              Show confirmed balance in satoshis',
  '  address, a                              Show the receive address',
  '  network, n                              Show the wallet network',
  '  reset, r                                Delete the stored mnemonic',
].join('\n');

export const NOT_INITIALIZED = 'Wallet not initialized';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliOptions {
  config?: WalletConfig;
  deps?: Partial<WalletDependencies>;
  io?: CliIO;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function resolveCommand(name: string | undefined): CommandName | null {
  if (name === undefined) {
    return 'help';
  }
  return COMMAND_ALIASES[name] ?? null;
}

/**
 * Split `--fee-tier <tier>` (or `--fee-tier=<tier>`) out of positional args
 */
export function parseSendArgs(args: readonly string[]): { positional: string[]; feeTier?: FeeTier } {
  const positional: string[] = [];
  let feeTier: FeeTier | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    let value: string | undefined;
    if (arg === '--fee-tier') {
      value = args[++i];
    } else if (arg.startsWith('--fee-tier=')) {
      value = arg.slice('--fee-tier='.length);
    } else {
      positional.push(arg);
      continue;
    }
    if (value === undefined || !isFeeTier(value)) {
      throw new Error(`--fee-tier must be one of low, medium, high (got ${value ?? 'nothing'})`);
    }
    feeTier = value;
  }

  return { positional, feeTier };
}

function parseAmount(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Amount must be a whole number of satoshis, got ${raw}`);
  }
  return Number(raw);
}

/**
 * Run one command. Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO;
  const [name, ...args] = argv;
  const command = resolveCommand(name);

  if (command === null) {
    io.err(`Unknown command: ${name}`);
    io.err(USAGE);
    return 1;
  }
  if (command === 'help') {
    io.out(USAGE);
    return 0;
  }

  try {
    const config = options.config ?? ConfigLoader.loadConfig();
    const deps = options.deps ?? {};

    switch (command) {
      case 'create': {
        const { wallet, mnemonic } = await Wallet.create(config, deps);
        io.out(`Mnemonic: ${mnemonic}`);
        io.out(`Address: ${wallet.getAddress()}`);
        return 0;
      }
      case 'mnemonic': {
        if (args.length === 0) {
          io.err('Usage: wallet mnemonic <words...>');
          return 1;
        }
        const wallet = await Wallet.fromMnemonic(args.join(' '), config, deps);
        io.out(`Address: ${wallet.getAddress()}`);
        return 0;
      }
    }

    const wallet = await Wallet.load(config, deps);
    if (!wallet) {
      io.err(NOT_INITIALIZED);
      return 1;
    }

    switch (command) {
      case 'address':
        io.out(wallet.getAddress());
        return 0;
      case 'network':
        io.out(wallet.getNetwork());
        return 0;
      case 'balance':
        io.out(`${await wallet.getBalance()} sats`);
        return 0;
      case 'reset':
        await wallet.reset();
        io.out('Wallet reset');
        return 0;
      case 'send': {
        const { positional, feeTier } = parseSendArgs(args);
        if (positional.length !== 2) {
          io.err('Usage: wallet send <to> <amount> [--fee-tier low|medium|high]');
          return 1;
        }
        const [to, rawAmount] = positional;
        const result = await wallet.send(to, parseAmount(rawAmount), feeTier);
        io.out(`Transaction broadcast: ${result.txid}`);
        io.out(`Amount: ${result.amount} sats, fee: ${result.fee} sats (${result.feeRate} sat/byte, ${result.feeTier})`);
        return 0;
      }
    }
  } catch (error) {
    reportError(error, io);
    return 1;
  }
}

function reportError(error: unknown, io: CliIO): void {
  if (error instanceof BroadcastError) {
    io.err(`Error [${error.kind}]: ${error.reason}`);
  } else if (isWalletError(error)) {
    io.err(`Error [${error.kind}]: ${error.message}`);
  } else if (error instanceof Error) {
    io.err(`Error: ${error.message}`);
  } else {
    io.err(`Error: ${String(error)}`);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
