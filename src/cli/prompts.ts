import type readline from 'node:readline';
import { EXPORT_FORMATS, isExportFormat, type ExportFormat } from '../export/sinks.js';

export interface NumberRule {
  defaultValue: number;
  min: number;
  max?: number;
}

export type AnswerResult<T> = { ok: true; value: T } | { ok: false; error: string };

/** Blank answers take the default. */
export function parseNumberAnswer(answer: string, rule: NumberRule): AnswerResult<number> {
  const trimmed = answer.trim();
  if (!trimmed) return { ok: true, value: rule.defaultValue };

  if (!/^-?\d+$/.test(trimmed)) {
    return { ok: false, error: 'Please enter a whole number' };
  }
  const value = Number(trimmed);
  if (value < rule.min || (rule.max !== undefined && value > rule.max)) {
    const range = rule.max !== undefined ? `between ${rule.min} and ${rule.max}` : `at least ${rule.min}`;
    return { ok: false, error: `Please enter a number ${range}` };
  }
  return { ok: true, value };
}

export const FORMAT_MENU = [
  '1. JSON (all fields)',
  '2. CSV (summary columns)',
  '3. Markdown report',
  '4. All of the above',
  '5. No export',
] as const;

export function parseFormatChoice(answer: string): AnswerResult<ExportFormat[]> {
  switch (answer.trim()) {
    case '1':
      return { ok: true, value: ['json'] };
    case '2':
      return { ok: true, value: ['csv'] };
    case '3':
      return { ok: true, value: ['markdown'] };
    case '4':
      return { ok: true, value: [...EXPORT_FORMATS] };
    case '5':
      return { ok: true, value: [] };
    default:
      return { ok: false, error: 'Please choose 1-5' };
  }
}

/**
 * Parse `--format`: a comma list of json/csv/markdown (md), or all / none.
 */
export function parseFormatOption(value: string): AnswerResult<ExportFormat[]> {
  const parts = value
    .split(',')
    .map((p) => p.trim().toLowerCase())
    .filter((p) => p.length > 0);

  if (parts.length === 1 && parts[0] === 'all') return { ok: true, value: [...EXPORT_FORMATS] };
  if (parts.length === 1 && parts[0] === 'none') return { ok: true, value: [] };

  const formats: ExportFormat[] = [];
  for (const part of parts) {
    const format = part === 'md' ? 'markdown' : part;
    if (!isExportFormat(format)) {
      return { ok: false, error: `Unknown format: ${part}` };
    }
    if (!formats.includes(format)) formats.push(format);
  }
  if (formats.length === 0) return { ok: false, error: 'No export format given' };
  return { ok: true, value: formats };
}

function question(rl: readline.Interface, text: string): Promise<string> {
  return new Promise<string>((resolve) => {
    rl.question(text, resolve);
  });
}

/** Ask until `parse` accepts the answer. */
export async function ask<T>(
  rl: readline.Interface,
  text: string,
  parse: (answer: string) => AnswerResult<T>,
  onInvalid: (error: string) => void,
): Promise<T> {
  while (true) {
    const result = parse(await question(rl, text));
    if (result.ok) return result.value;
    onInvalid(result.error);
  }
}
