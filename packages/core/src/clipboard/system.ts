/**
 * System clipboard via clipboardy (pbcopy, xsel/wl-copy, or the Windows clipboard).
 */

import clipboardy from 'clipboardy';
import type { Clipboard } from './types.js';

export class SystemClipboard implements Clipboard {
  async write(text: string): Promise<void> {
    await clipboardy.write(text);
  }
}
