import { CommandContext, printVerification, withLedger } from '../context';

export interface VerifyChainOptions {
  partition: string;
  from?: string;
  to?: string;
}

export interface VerifyAnchorOptions {
  partition: string;
  period: string;
}

export async function verifyRecordCommand(options: { id: string }, context: CommandContext): Promise<boolean> {
  const result = await withLedger(context, ledger => ledger.verifyRecord(options.id));
  return printVerification(`Record ${options.id}`, result);
}

export async function verifyChainCommand(options: VerifyChainOptions, context: CommandContext): Promise<boolean> {
  const result = await withLedger(context, ledger => ledger.verifyChain(options.partition, options.from, options.to));
  return printVerification(`Chain ${options.partition}`, result);
}

export async function verifyAnchorCommand(options: VerifyAnchorOptions, context: CommandContext): Promise<boolean> {
  const result = await withLedger(context, ledger => ledger.verifyAnchor(options.partition, options.period));
  return printVerification(`Anchor ${options.partition}/${options.period}`, result);
}
