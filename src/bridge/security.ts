import { SecurityError } from './errors.js';

const DANGEROUS_PATTERNS: RegExp[] = [
  // shell
  /rm\s+-rf/i,
  /sudo/i,
  /rm\s+\//i,
  /mkfs/i,
  /dd\s+if=/i,
  />\s+\/dev\/sd/i,
  // AppleScript
  /do shell script.*sudo/i,
  /with administrator privileges/i,
  /system attribute/i,
  /delete file/i,
];

/** Throws SecurityError naming the first dangerous pattern found in `code`. */
export function screenScript(code: string): void {
  const hit = DANGEROUS_PATTERNS.find((pattern) => pattern.test(code));
  if (hit) throw new SecurityError(hit.source);
}
