import { PayloadValidationError } from './errors';

/**
 * Partition names double as directory names in the FILE backend.
 */
export const PARTITION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export function isValidPartition(name: string): boolean {
  return PARTITION_PATTERN.test(name);
}

export function assertPartition(name: string): void {
  if (!isValidPartition(name)) {
    throw new PayloadValidationError(
      `Invalid partition name "${name}" (letters, digits, ".", "_" or "-", starting with a letter or digit, at most 128 characters)`
    );
  }
}
