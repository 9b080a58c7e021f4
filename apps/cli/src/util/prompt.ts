/**
 * Secret prompt for `add`/`update` when neither --secret nor --url is given.
 * Reads TOTP_SECRET from the environment, or prompts on the terminal without echo.
 */

import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';

export interface PromptStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean };
  output: NodeJS.WritableStream;
}

export function readSecret(
  prompt: string,
  env: Record<string, string | undefined> = process.env,
  streams: PromptStreams = { input: process.stdin, output: process.stderr },
): Promise<string> {
  const fromEnv = env.TOTP_SECRET;
  if (fromEnv) {
    return Promise.resolve(fromEnv);
  }

  return new Promise((resolve, reject) => {
    let muted = false;
    let answered = false;

    // Echo goes through here; typed characters are dropped while muted
    const echo = new Writable({
      write(chunk, _encoding, callback) {
        if (!muted) streams.output.write(chunk);
        callback();
      },
    });

    const rl = createInterface({ input: streams.input, output: echo, terminal: streams.input.isTTY === true });

    streams.output.write(prompt);
    muted = true;

    rl.question('', (answer) => {
      answered = true;
      muted = false;
      streams.output.write('\n');
      rl.close();
      resolve(answer);
    });

    // input closed before a line arrived
    rl.on('close', () => {
      if (!answered) resolve('');
    });
    rl.on('error', reject);
  });
}
