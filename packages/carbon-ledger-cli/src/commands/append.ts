/**
 * Append and amend commands
 */

import { LedgerRecord } from 'carbon-ledger';
import { CommandContext, readPayloadFile, withLedger } from '../context';

export interface AppendOptions {
  partition?: string;
  file: string;
}

export interface AmendOptions {
  id: string;
  file: string;
}

function printRecord(record: LedgerRecord): void {
  console.log(`   Id: ${record.id}`);
  console.log(`   Partition: ${record.partition} #${record.sequence}`);
  console.log(`   Hash: ${record.recordHash}`);
  console.log(`   Previous: ${record.previousHash ?? '(genesis)'}`);
}

export async function appendCommand(options: AppendOptions, context: CommandContext): Promise<LedgerRecord> {
  const payload = await readPayloadFile(options.file);
  const record = await withLedger(context, ledger =>
    ledger.appendRecord(payload, options.partition !== undefined ? { partition: options.partition } : {})
  );

  console.log('✅ Record appended');
  printRecord(record);
  return record;
}

export async function amendCommand(options: AmendOptions, context: CommandContext): Promise<LedgerRecord> {
  const payload = await readPayloadFile(options.file);
  const record = await withLedger(context, ledger => ledger.amendRecord(options.id, payload));

  console.log(`✅ Record ${options.id} amended`);
  printRecord(record);
  return record;
}
