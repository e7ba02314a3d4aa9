// src/font/path-data.ts

import { FontDataError } from "../core/errors";
import type { PathCommand, PathStep } from "./font";

/** Parameters consumed per repetition of each command. */
const PARAM_COUNTS: Record<PathCommand, number> = {
  M: 2, m: 2,
  L: 2, l: 2,
  H: 1, h: 1,
  V: 1, v: 1,
  C: 6, c: 6,
  S: 4, s: 4,
  Q: 4, q: 4,
  T: 2, t: 2,
  A: 7, a: 7,
  Z: 0, z: 0,
};

const NUMBER_RE = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/g;
const COMMAND_CHUNK_RE = /[MmLlHhVvCcSsQqTtAaZz][^MmLlHhVvCcSsQqTtAaZz]*/g;
const SEPARATOR_RE = /^[\s,]*$/;

export function isPathCommand(c: string): c is PathCommand {
  return Object.prototype.hasOwnProperty.call(PARAM_COUNTS, c);
}

/**
 * Parse an SVG path "d" attribute into path steps.
 *
 * Throws FontDataError on unknown commands, stray characters, or a
 * parameter list that does not fit the command.
 */
export function parsePathData(d: string): PathStep[] {
  const steps: PathStep[] = [];
  const trimmed = d.trim();
  if (!trimmed) return steps;

  if (!/^[MmLlHhVvCcSsQqTtAaZz]/.test(trimmed)) {
    throw new FontDataError(`Path data must start with a command: "${trimmed.slice(0, 20)}"`);
  }

  // "e"/"E" only appear inside exponents; any other non-command letter is bad data.
  const stray = /[^MmLlHhVvCcSsQqTtAaZzEe\d\s,.+-]/.exec(trimmed);
  if (stray) {
    throw new FontDataError(`Unsupported path command "${stray[0]}"`);
  }

  const chunks = trimmed.match(COMMAND_CHUNK_RE) || [];
  for (const chunk of chunks) {
    const letter = chunk[0];
    if (!isPathCommand(letter)) {
      throw new FontDataError(`Unsupported path command "${letter}"`);
    }
    steps.push({ command: letter, params: parseParams(letter, chunk.slice(1)) });
  }
  return steps;
}

function parseParams(command: PathCommand, body: string): number[] {
  const params: number[] = [];
  const leftover = body.replace(NUMBER_RE, (m) => {
    params.push(Number(m));
    return " ";
  });
  if (!SEPARATOR_RE.test(leftover)) {
    throw new FontDataError(`Unable to parse parameters for "${command}": "${body.trim()}"`);
  }
  validateParams(command, params);
  return params;
}

/**
 * Check that params holds a whole number of repetitions for command.
 */
export function validateParams(command: PathCommand, params: number[]): void {
  const count = PARAM_COUNTS[command];
  if (count === 0) {
    if (params.length > 0) {
      throw new FontDataError(`"${command}" takes no parameters, got ${params.length}`);
    }
    return;
  }
  if (params.length === 0 || params.length % count !== 0) {
    throw new FontDataError(
      `"${command}" takes parameters in groups of ${count}, got ${params.length}`
    );
  }
  for (const p of params) {
    if (!Number.isFinite(p)) {
      throw new FontDataError(`"${command}" has a non-numeric parameter`);
    }
  }
}
