/**
 * Report Name Parser
 *
 * Benchmark names encode the program and input size:
 *
 *   Input Size 5/insertionSort
 *   Input Sizes (5, 4)/merge
 *   Baseline for Input Size 5
 *
 * A name that does not parse aborts the whole correlation pass.
 */

import { binarySize, unarySize } from '../data-size/index.js';
import type { DataSize } from '../data-size/index.js';
import { Errors } from '../errors/index.js';
import type { ParsedReportName } from './types.js';

const BASELINE_MARKER = 'Baseline for';
const SIZE_TOKEN = 'Input Size';

// "Input Size" + optional plural letter, then "(n1, n2)" or "n"
const SIZE_PATTERN = /^Input Size[A-Za-z]?\s*(?:\(\s*(\d+)\s*,\s*(\d+)\s*\)|(\d+))/;

export function isBaselineName(name: string): boolean {
  return name.includes(BASELINE_MARKER);
}

function parseSize(name: string, text: string): { size: DataSize; rest: string } {
  const match = SIZE_PATTERN.exec(text);
  if (!match) {
    throw Errors.invalidReportName(name, `expected "${SIZE_TOKEN} <n>" or "${SIZE_TOKEN}s (<n>, <n>)"`);
  }

  const [whole, first, second, single] = match;
  const size = single !== undefined ? unarySize(Number(single)) : binarySize(Number(first), Number(second));
  return { size, rest: text.slice(whole.length) };
}

export function parseReportName(name: string): ParsedReportName {
  if (isBaselineName(name)) {
    const afterMarker = name.slice(name.indexOf(BASELINE_MARKER) + BASELINE_MARKER.length);
    const tokenAt = afterMarker.indexOf(SIZE_TOKEN);
    if (tokenAt < 0) {
      throw Errors.invalidReportName(name, `baseline name has no "${SIZE_TOKEN}"`);
    }
    const { size, rest } = parseSize(name, afterMarker.slice(tokenAt));
    if (rest.trim().length > 0) {
      throw Errors.invalidReportName(name, `unexpected text after baseline size: "${rest.trim()}"`);
    }
    return { baseline: true, size };
  }

  const { size, rest } = parseSize(name, name);
  const separator = /^\s*\//.exec(rest);
  if (!separator) {
    throw Errors.invalidReportName(name, 'expected "/" after the input size');
  }
  const programId = rest.slice(separator[0].length);
  if (programId.length === 0) {
    throw Errors.invalidReportName(name, 'missing program identifier');
  }
  return { baseline: false, size, programId };
}
