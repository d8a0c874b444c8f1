import readline from 'readline/promises';

export interface Prompt {
  /** Resolves with the entered line, or `null` once input has ended. */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
  close(): void;
}

export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompt {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  const closedSignal = new Promise<null>(resolve => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  return {
    ask(question: string): Promise<string | null> {
      if (closed) {
        return Promise.resolve(null);
      }
      return Promise.race([rl.question(question), closedSignal]);
    },
    print(line: string): void {
      output.write(`${line}\n`);
    },
    close(): void {
      rl.close();
    }
  };
}
