#!/usr/bin/env node
/**
 * Carbon Ledger CLI
 * Commands: append, amend, verify-record, verify-chain, anchor,
 * verify-anchor, audit, doctor
 */

import { Command } from 'commander';
import { amendCommand, appendCommand } from './commands/append';
import { anchorCommand } from './commands/anchor';
import { auditCommand } from './commands/audit';
import { doctorCommand } from './commands/doctor';
import { verifyAnchorCommand, verifyChainCommand, verifyRecordCommand } from './commands/verify';
import { CommandContext } from './context';

function fail(error: unknown): never {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}

/**
 * Run a command action; exit 1 when it throws or reports failure.
 */
async function run(action: () => Promise<unknown>): Promise<void> {
  try {
    const outcome = await action();
    if (outcome === false) {
      process.exit(1);
    }
  } catch (error) {
    fail(error);
  }
}

export function buildProgram(context: CommandContext = { env: process.env }): Command {
  const program = new Command();

  program
    .name('carbon-ledger')
    .description('Tamper-evident ledger for carbon emission records')
    .version('0.1.0');

  program
    .command('append')
    .description('Append a record read from a JSON file')
    .option('--partition <name>', 'Partition (default: LEDGER_DEFAULT_PARTITION)')
    .requiredOption('--file <path>', 'JSON payload file')
    .action(async (options: { partition?: string; file: string }) => {
      await run(() => appendCommand(options, context));
    });

  program
    .command('amend')
    .description('Append a revision that supersedes a record')
    .requiredOption('--id <recordId>', 'Record to supersede (latest revision)')
    .requiredOption('--file <path>', 'JSON payload file')
    .action(async (options: { id: string; file: string }) => {
      await run(() => amendCommand(options, context));
    });

  program
    .command('verify-record')
    .description('Recompute one record hash')
    .requiredOption('--id <recordId>', 'Record id')
    .action(async (options: { id: string }) => {
      await run(() => verifyRecordCommand(options, context));
    });

  program
    .command('verify-chain')
    .description('Verify a partition chain, optionally between two records')
    .requiredOption('--partition <name>', 'Partition')
    .option('--from <recordId>', 'First record (default: genesis)')
    .option('--to <recordId>', 'Last record (default: head)')
    .action(async (options: { partition: string; from?: string; to?: string }) => {
      await run(() => verifyChainCommand(options, context));
    });

  program
    .command('anchor')
    .description('Anchor a closed period, or every pending period')
    .option('--partition <name>', 'Partition (all partitions with --pending)')
    .option('--period <YYYY-MM-DD>', 'UTC day to anchor')
    .option('--pending', 'Anchor every closed, unanchored period')
    .action(async (options: { partition?: string; period?: string; pending?: boolean }) => {
      await run(() => anchorCommand(options, context));
    });

  program
    .command('verify-anchor')
    .description('Recompute a period Merkle root and compare it with its anchor')
    .requiredOption('--partition <name>', 'Partition')
    .requiredOption('--period <YYYY-MM-DD>', 'UTC day')
    .action(async (options: { partition: string; period: string }) => {
      await run(() => verifyAnchorCommand(options, context));
    });

  program
    .command('audit')
    .description('Audit a period: anchor check plus chain check')
    .requiredOption('--partition <name>', 'Partition')
    .requiredOption('--period <YYYY-MM-DD>', 'UTC day')
    .action(async (options: { partition: string; period: string }) => {
      await run(() => auditCommand(options, context));
    });

  program
    .command('doctor')
    .description('Check store configuration and append-only protection')
    .action(async () => {
      await run(() => doctorCommand(context));
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync()
    .catch(fail);
}
