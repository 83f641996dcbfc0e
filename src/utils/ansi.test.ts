import { describe, it, expect } from 'vitest';
import { ansi256Bg, ansi256Fg, rgbTo256 } from './ansi.js';

describe('rgbTo256', () => {
  it('maps pure colors onto the color cube', () => {
    expect(rgbTo256(255, 0, 0)).toBe(196);
    expect(rgbTo256(0, 255, 0)).toBe(46);
    expect(rgbTo256(0, 0, 255)).toBe(21);
  });

  it('maps black and white onto the cube corners', () => {
    expect(rgbTo256(0, 0, 0)).toBe(16);
    expect(rgbTo256(255, 255, 255)).toBe(231);
  });

  it('prefers the gray ramp for mid grays', () => {
    expect(rgbTo256(128, 128, 128)).toBe(244);
  });
});

describe('256-color escapes', () => {
  it('builds foreground and background sequences', () => {
    expect(ansi256Fg(196)).toBe('\x1b[38;5;196m');
    expect(ansi256Bg(21)).toBe('\x1b[48;5;21m');
  });
});
