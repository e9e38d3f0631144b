/**
 * Anchor command - commit one closed period, or every pending one
 */

import { MerkleAnchor, PayloadValidationError } from 'carbon-ledger';
import { CommandContext, withLedger } from '../context';

export interface AnchorOptions {
  partition?: string;
  period?: string;
  pending?: boolean;
}

export async function anchorCommand(options: AnchorOptions, context: CommandContext): Promise<MerkleAnchor[]> {
  const { partition, period } = options;

  if (options.pending) {
    if (period !== undefined) {
      throw new PayloadValidationError('--period cannot be combined with --pending');
    }
    const anchors = await withLedger(context, ledger => ledger.anchorPendingPeriods(partition));
    if (anchors.length === 0) {
      console.log('✅ No pending periods');
    }
    anchors.forEach(printAnchor);
    return anchors;
  }

  if (partition === undefined || period === undefined) {
    throw new PayloadValidationError('--partition and --period are required unless --pending is given');
  }
  const anchor = await withLedger(context, ledger => ledger.anchorPeriod(partition, period));
  printAnchor(anchor);
  return [anchor];
}

function printAnchor(anchor: MerkleAnchor): void {
  console.log(`⚓ ${anchor.partition}/${anchor.period}: ${anchor.rootHash} (${anchor.recordCount} records)`);
}
