import { createInterface, type Interface } from 'node:readline';

/** Line-oriented operator input: the only way the pipeline reads from a human. */
export interface InputPort {
  ask(question: string): Promise<string>;
  close(): void;
}

export function createTerminalInput(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): InputPort {
  let rl: Interface | null = null;
  let ended = false;
  // Piped stdin can deliver every answer before the first question is asked.
  const buffered: string[] = [];
  const waiting: Array<(line: string) => void> = [];

  const ensure = (): void => {
    if (rl || ended) return;
    rl = createInterface({ input, output });
    rl.on('line', (line) => {
      const next = waiting.shift();
      if (next) next(line);
      else buffered.push(line);
    });
    rl.once('close', () => {
      ended = true;
      rl = null;
      // stdin at EOF reads as an empty answer, i.e. the default.
      for (const resolve of waiting.splice(0)) resolve('');
    });
  };

  return {
    ask(question: string): Promise<string> {
      ensure();
      output.write(question);
      const line = buffered.shift();
      if (line !== undefined) return Promise.resolve(line);
      if (ended) return Promise.resolve('');
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close(): void {
      rl?.close();
    },
  };
}
