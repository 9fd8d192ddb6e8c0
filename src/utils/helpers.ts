import type { Category, Finding, Severity } from '../types.js';

/** One entry of an analyzer's check list; `emit` turns the list into findings. */
export type Check = {
  name: string;
  pass: boolean;
  sev: Severity;
  msgPass: string;
  msgFail: string;
};

export function emit(category: Category, checks: readonly Check[]): Finding[] {
  return checks.map((c) => ({
    category,
    name: c.name,
    passed: c.pass,
    severity: c.sev,
    details: c.pass ? c.msgPass : c.msgFail,
  }));
}

export const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? '' : 's'}`;
