import type { VideoType } from '../types/snapshot';
import { MalformedDurationError } from '../utils/errors';

/** Videos at or under this length are short-form */
export const SHORT_FORM_MAX_SECONDS = 180;

const DURATION_PATTERN = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;

export interface DurationInfo {
  seconds: number;
  formatted: string;
  videoType: VideoType;
}

/**
 * Total seconds of a `P[nD][T[nH][nM][nS]]` token, e.g. `PT1H2M3S` -> 3723.
 * Throws MalformedDurationError for anything else (weeks, fractions, bare `P` or `PT`).
 */
export function parseDuration(token: string): number {
  const match = DURATION_PATTERN.exec(token);
  // The pattern alone admits `P` and a dangling `T`
  if (!match || token === 'P' || token.endsWith('T')) {
    throw new MalformedDurationError(token);
  }

  const [, days, hours, minutes, seconds] = match;
  const total =
    Number(days ?? 0) * 86400 +
    Number(hours ?? 0) * 3600 +
    Number(minutes ?? 0) * 60 +
    Number(seconds ?? 0);

  if (!Number.isSafeInteger(total)) {
    throw new MalformedDurationError(token);
  }
  return total;
}

/**
 * `H:MM:SS` when there is at least an hour, else `M:SS`
 */
export function formatDuration(totalSeconds: number): string {
  const safe = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(safe / 3600);
  const minutes = Math.floor((safe % 3600) / 60);
  const seconds = safe % 60;
  const ss = String(seconds).padStart(2, '0');

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  }
  return `${minutes}:${ss}`;
}

export function classifyDuration(totalSeconds: number): VideoType {
  return totalSeconds <= SHORT_FORM_MAX_SECONDS ? 'short' : 'full_length';
}

export function describeDuration(token: string): DurationInfo {
  const seconds = parseDuration(token);
  return {
    seconds,
    formatted: formatDuration(seconds),
    videoType: classifyDuration(seconds)
  };
}
