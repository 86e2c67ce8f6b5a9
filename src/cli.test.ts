import { parseVerifyArgs } from './cli.js';

describe('parseVerifyArgs', () => {
  it('reads the file and flags', () => {
    expect(parseVerifyArgs(['out.mp4', '--duration', '8000', '--require-audio'])).toEqual({
      file: 'out.mp4', durationMs: 8000, requireAudio: true,
    });
  });

  it('leaves the duration unset when not given', () => {
    expect(parseVerifyArgs(['out.mp4'])).toEqual({ file: 'out.mp4', requireAudio: false });
  });

  it('rejects bad input', () => {
    expect(() => parseVerifyArgs([])).toThrow('verify: missing <file>');
    expect(() => parseVerifyArgs(['out.mp4', '--duration', 'soon'])).toThrow('verify: --duration takes a positive number of ms');
    expect(() => parseVerifyArgs(['out.mp4', '--fast'])).toThrow('verify: unknown option --fast');
  });
});
