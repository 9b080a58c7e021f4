/** Length of every code this tool hands out. */
export const TOTP_DIGITS = 6;
/** Time step, in seconds, of the codes this tool hands out. */
export const TOTP_PERIOD = 30;

export interface CodeGenerator {
  /** Backend name, shown by `totp doctor` and in debug output */
  readonly name: string;
  /** Compute the current code for a Base32 secret */
  generate(secret: string): Promise<string>;
}
