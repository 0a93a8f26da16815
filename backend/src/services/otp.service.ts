import readline from 'readline';
import { AuthenticationError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('Otp');

const OTP_PATTERN = /^\d{4,8}$/;

export function isValidOtp(code: string): boolean {
  return OTP_PATTERN.test(code);
}

export type OtpProvider = () => Promise<string>;

/**
 * Blocks on the console until a well-formed one-time passcode is typed.
 * Empty or malformed lines are rejected and the prompt is shown again.
 */
export class OtpPrompt {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
    private readonly prompt: string = 'Enter OTP: ',
  ) {}

  async read(): Promise<string> {
    const rl = readline.createInterface({ input: this.input, terminal: false });

    try {
      this.output.write(this.prompt);
      for await (const line of rl) {
        const code = line.trim();
        if (isValidOtp(code)) {
          return code;
        }
        logger.warn(code ? 'OTP must be 4 to 8 digits' : 'OTP cannot be empty');
        this.output.write(this.prompt);
      }
    } finally {
      rl.close();
    }

    throw new AuthenticationError('Input closed before an OTP was entered');
  }
}
