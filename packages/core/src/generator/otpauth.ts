/**
 * OtpauthGenerator — computes the code in-process with the otpauth library.
 */

import { Secret, TOTP } from 'otpauth';
import { errorMessage, generationError } from '../errors.js';
import { parseCode } from './parse.js';
import { TOTP_DIGITS, TOTP_PERIOD, type CodeGenerator } from './types.js';

export class OtpauthGenerator implements CodeGenerator {
  readonly name = 'otpauth';

  constructor(private readonly now: () => number = Date.now) {}

  async generate(secret: string): Promise<string> {
    let key: Secret;
    try {
      key = Secret.fromBase32(secret.replace(/\s+/g, '').toUpperCase());
    } catch (err: unknown) {
      throw generationError(`Secret is not valid Base32: ${errorMessage(err)}`);
    }

    const totp = new TOTP({ secret: key, algorithm: 'SHA1', digits: TOTP_DIGITS, period: TOTP_PERIOD });
    return parseCode(totp.generate({ timestamp: this.now() }));
  }
}
