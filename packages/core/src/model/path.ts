import { InvalidPathError } from '../types/errors.js';
import { attempt, type Result } from '../types/result.js';

export type AttributePath = readonly string[];

/**
 * Split a dotted attribute path (or accept an already segmented one) and
 * check every segment. A one-element array is split like a string. Nothing
 * is mutated before this succeeds.
 *
 * @throws InvalidPathError for empty input, a trailing dot, empty segments,
 *   segments with surrounding whitespace or segments still holding a dot
 */
export function parseAttributePath(
  input: string | readonly string[] | null | undefined
): AttributePath {
  if (input === null || input === undefined || input.length === 0) {
    throw new InvalidPathError(input);
  }

  let segments: readonly string[];
  if (typeof input === 'string') {
    segments = input.split('.');
  } else if (input.length === 1) {
    segments = input.join('').split('.');
  } else {
    segments = input;
  }

  for (const segment of segments) {
    if (
      segment.length === 0 ||
      segment.includes('.') ||
      segment.trim() !== segment
    ) {
      throw new InvalidPathError(input);
    }
  }
  return segments;
}

export function tryParseAttributePath(
  input: string | readonly string[]
): Result<AttributePath, InvalidPathError> {
  return attempt(
    () => parseAttributePath(input),
    (error): error is InvalidPathError => error instanceof InvalidPathError
  );
}

export function formatAttributePath(path: AttributePath, upTo?: number): string {
  const end = upTo === undefined ? path.length : upTo + 1;
  return path.slice(0, end).join('.');
}
