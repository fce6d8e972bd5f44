import * as readline from 'readline';
import type { Prompter } from './menu';

/**
 * Prompter over a readline interface.
 *
 * Lines are queued as they arrive, so input delivered several lines per
 * chunk (piped or pasted) is answered one question at a time. Once the
 * input closes, queued lines are still handed out and then every further
 * question resolves to null.
 */
export function createLinePrompter(
  rl: readline.Interface,
  output: NodeJS.WritableStream
): Prompter {
  const lines: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];
  let closed = false;

  rl.on('line', (line: string) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      lines.push(line);
    }
  });

  rl.once('close', () => {
    closed = true;
    for (const resolve of waiting.splice(0)) {
      resolve(null);
    }
  });

  return {
    ask(question: string): Promise<string | null> {
      output.write(question);

      const line = lines.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (closed) return Promise.resolve(null);

      return new Promise((resolve) => waiting.push(resolve));
    },
  };
}
