import type { Logger } from '../logging/logger.js';
import type { InputPort } from './input.js';

export const MAX_OPTIONS = 26;

const LETTER_BASE = 'A'.charCodeAt(0);
const SINGLE_LETTER = /^[A-Z]$/;

export type OptionList = readonly string[];

export type SelectionResult =
  | { kind: 'multiple'; indices: number[] }
  | { kind: 'single'; index: number }
  | { kind: 'invalid'; reason: string };

export function createOptionList(labels: string[]): OptionList {
  if (labels.length === 0 || labels.length > MAX_OPTIONS) {
    throw new RangeError(
      `Option list must have between 1 and ${MAX_OPTIONS} entries, got ${labels.length}`
    );
  }
  return Object.freeze([...labels]);
}

export function letterFor(index: number): string {
  if (!Number.isInteger(index) || index < 0 || index >= MAX_OPTIONS) {
    throw new RangeError(`No option letter for index ${index}`);
  }
  return String.fromCharCode(LETTER_BASE + index);
}

function indexFor(token: string, optionCount: number): number | undefined {
  if (!SINGLE_LETTER.test(token)) return undefined;
  const index = token.charCodeAt(0) - LETTER_BASE;
  return index < optionCount ? index : undefined;
}

/**
 * All-or-nothing: a single bad token invalidates the whole answer.
 * Multi-select keeps the operator's order and any duplicates.
 */
export function parseSelection(
  raw: string,
  optionCount: number,
  allowMultiple: boolean
): SelectionResult {
  if (!allowMultiple) {
    const token = raw.trim().toUpperCase();
    const index = indexFor(token, optionCount);
    if (index === undefined) {
      return { kind: 'invalid', reason: `"${raw.trim()}" is not a single valid option letter` };
    }
    return { kind: 'single', index };
  }

  const indices: number[] = [];
  for (const part of raw.split(',')) {
    const token = part.trim().toUpperCase();
    const index = indexFor(token, optionCount);
    if (index === undefined) {
      return { kind: 'invalid', reason: `"${part.trim()}" is not a valid option letter` };
    }
    indices.push(index);
  }
  return { kind: 'multiple', indices };
}

export function instructionFor(allowMultiple: boolean, defaultChoice: string): string {
  return allowMultiple
    ? `Enter one or more letters separated by commas (e.g. A,C). Press Enter for the default (${defaultChoice}).`
    : `Enter a single letter. Press Enter for the default (${defaultChoice}).`;
}

export interface SelectIo {
  input: InputPort;
  logger: Logger;
}

export function select(
  io: SelectIo,
  promptText: string,
  options: OptionList,
  defaultChoice: string,
  allowMultiple: true
): Promise<Extract<SelectionResult, { kind: 'multiple' | 'invalid' }>>;
export function select(
  io: SelectIo,
  promptText: string,
  options: OptionList,
  defaultChoice: string,
  allowMultiple: false
): Promise<Extract<SelectionResult, { kind: 'single' | 'invalid' }>>;
export async function select(
  io: SelectIo,
  promptText: string,
  options: OptionList,
  defaultChoice: string,
  allowMultiple: boolean
): Promise<SelectionResult> {
  const { input, logger } = io;
  logger.prompt(promptText);
  options.forEach((label, i) => logger.prompt(`${letterFor(i)}. ${label}`));
  logger.prompt(instructionFor(allowMultiple, defaultChoice));

  const answer = await input.ask('> ');
  const raw = answer.trim() === '' ? defaultChoice : answer;
  logger.info(`Selection input: "${raw}"`, { quiet: true });

  return parseSelection(raw, options.length, allowMultiple);
}
