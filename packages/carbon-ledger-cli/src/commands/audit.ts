/**
 * Audit command - anchor check, then a chain check over the period to
 * locate any divergence
 */

import { CommandContext, printVerification, withLedger } from '../context';

export interface AuditOptions {
  partition: string;
  period: string;
}

export async function auditCommand(options: AuditOptions, context: CommandContext): Promise<boolean> {
  console.log(`📋 Auditing ${options.partition}/${options.period}\n`);

  const audit = await withLedger(context, ledger => ledger.auditPeriod(options.partition, options.period));

  printVerification('Anchor', audit.anchor);
  printVerification('Chain', audit.chain);
  console.log('');

  if (audit.ok) {
    console.log('✅ Period intact');
  } else {
    console.log('⚠️  Period failed audit. Review the findings above.');
  }
  return audit.ok;
}
