import crypto from 'crypto';

// Mirrors how a value reads when printed: scalars as-is, structures as JSON.
export function stringForm(value: unknown): string {
  if (value !== null && typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function sha256Hex(value: unknown): string {
  return crypto.createHash('sha256').update(stringForm(value)).digest('hex');
}
