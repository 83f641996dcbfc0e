/**
 * ANSI escape codes used by the text viewer and the image preview, plus
 * mapping from 24-bit colors onto the xterm 256-color palette.
 */

// --- SGR constants ---

export const ANSI_RESET = '\x1b[0m';
export const ANSI_YELLOW = '\x1b[33m';
export const ANSI_GRAY = '\x1b[90m';

// --- ANSI escape sequence pattern for parsing/stripping ---

/** Matches SGR sequences like \x1b[32m, \x1b[0m, \x1b[1;34m, \x1b[38;5;196m */
export const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

// --- 256-color helpers ---

const CUBE_LEVELS = [0, 95, 135, 175, 215, 255];

function nearestCubeIndex(value: number): number {
  let best = 0;
  for (let i = 1; i < CUBE_LEVELS.length; i++) {
    if (Math.abs(CUBE_LEVELS[i] - value) < Math.abs(CUBE_LEVELS[best] - value)) {
      best = i;
    }
  }
  return best;
}

/**
 * Map an RGB color to the closest entry of the xterm 256-color palette,
 * choosing between the 6x6x6 cube and the 24-step gray ramp.
 */
export function rgbTo256(r: number, g: number, b: number): number {
  const ri = nearestCubeIndex(r);
  const gi = nearestCubeIndex(g);
  const bi = nearestCubeIndex(b);
  const cubeCode = 16 + 36 * ri + 6 * gi + bi;
  const cubeDistance =
    (CUBE_LEVELS[ri] - r) ** 2 + (CUBE_LEVELS[gi] - g) ** 2 + (CUBE_LEVELS[bi] - b) ** 2;

  const average = (r + g + b) / 3;
  const grayStep = Math.max(0, Math.min(23, Math.round((average - 8) / 10)));
  const grayLevel = 8 + grayStep * 10;
  const grayDistance = (grayLevel - r) ** 2 + (grayLevel - g) ** 2 + (grayLevel - b) ** 2;

  return grayDistance < cubeDistance ? 232 + grayStep : cubeCode;
}

/** Foreground from the 256-color palette. */
export function ansi256Fg(code: number): string {
  return `\x1b[38;5;${code}m`;
}

/** Background from the 256-color palette. */
export function ansi256Bg(code: number): string {
  return `\x1b[48;5;${code}m`;
}
