/**
 * Shared plumbing for commands: open the ledger from the environment,
 * read payload files, print verification results.
 */

import * as fs from 'fs/promises';
import { CarbonLedger, FieldMap, PayloadValidationError, VerificationResult, assertFieldMap } from 'carbon-ledger';

export interface CommandContext {
  env: NodeJS.ProcessEnv;
}

export async function withLedger<T>(context: CommandContext, fn: (ledger: CarbonLedger) => Promise<T>): Promise<T> {
  const ledger = CarbonLedger.fromEnv(context.env);
  await ledger.initialize();
  try {
    return await fn(ledger);
  } finally {
    await ledger.shutdown();
  }
}

/**
 * Read a JSON object payload from disk.
 */
export async function readPayloadFile(file: string): Promise<FieldMap> {
  const text = await fs.readFile(file, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new PayloadValidationError(`${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  assertFieldMap(parsed);
  return parsed;
}

export function printVerification(subject: string, result: VerificationResult): boolean {
  if (result.ok) {
    console.log(`✅ ${subject} verified (${result.checked} checked)`);
    return true;
  }

  const at = result.firstBrokenRecordId !== undefined ? ` at record ${result.firstBrokenRecordId}` : '';
  console.log(`❌ ${subject} failed: ${result.reason ?? 'unknown'}${at}`);
  if (result.finding) {
    console.log(`   ${result.finding.detail}`);
  }
  return false;
}
