import { describe, it, expect } from 'vitest';
import { Readable, Writable } from 'stream';
import { OtpPrompt, isValidOtp } from '../src/services/otp.service';
import { AuthenticationError } from '../src/utils/errors';

function collector(): { stream: Writable; written: string[] } {
  const written: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      written.push(chunk.toString());
      callback();
    },
  });
  return { stream, written };
}

describe('isValidOtp', () => {
  it('should accept 4 to 8 digits', () => {
    expect(isValidOtp('1234')).toBe(true);
    expect(isValidOtp('12345678')).toBe(true);
  });

  it('should reject empty, short, long and non-numeric codes', () => {
    expect(isValidOtp('')).toBe(false);
    expect(isValidOtp('123')).toBe(false);
    expect(isValidOtp('123456789')).toBe(false);
    expect(isValidOtp('12a4')).toBe(false);
  });
});

describe('OtpPrompt', () => {
  it('should return the first well-formed code', async () => {
    const { stream, written } = collector();
    const prompt = new OtpPrompt(Readable.from(['4821\n']), stream);

    await expect(prompt.read()).resolves.toBe('4821');
    expect(written.join('')).toBe('Enter OTP: ');
  });

  it('should re-prompt on malformed and empty input', async () => {
    const { stream, written } = collector();
    const prompt = new OtpPrompt(Readable.from(['abc\n', '\n', '5678\n']), stream);

    await expect(prompt.read()).resolves.toBe('5678');
    expect(written.join('')).toBe('Enter OTP: Enter OTP: Enter OTP: ');
  });

  it('should trim surrounding whitespace', async () => {
    const { stream } = collector();
    const prompt = new OtpPrompt(Readable.from(['  9012  \n']), stream);

    await expect(prompt.read()).resolves.toBe('9012');
  });

  it('should fail when input closes before a valid code', async () => {
    const { stream } = collector();
    const prompt = new OtpPrompt(Readable.from(['12\n']), stream);

    await expect(prompt.read()).rejects.toBeInstanceOf(AuthenticationError);
  });
});
