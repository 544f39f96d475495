import { describe, expect, it } from 'vitest';

import { EXIT_SIGINT, toExitStatus } from './util';

describe('toExitStatus', () => {
  it('passes exit codes through', () => {
    expect(toExitStatus(0, null)).toBe(0);
    expect(toExitStatus(3, null)).toBe(3);
  });

  it('maps signals to 128 + n', () => {
    expect(toExitStatus(null, 'SIGINT')).toBe(EXIT_SIGINT);
    expect(toExitStatus(null, 'SIGTERM')).toBe(143);
    expect(toExitStatus(null, 'SIGKILL')).toBe(137);
  });

  it('falls back to 1', () => {
    expect(toExitStatus(null, null)).toBe(1);
  });
});
