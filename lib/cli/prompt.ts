import readline from 'readline';

/**
 * Ask a yes/no question on the terminal
 * Only "y" or "yes" (any case) counts as consent
 */
export function confirmOnTerminal(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<boolean> {
  const rl = readline.createInterface({ input, output });

  return new Promise((resolve) => {
    // End of input without an answer declines
    rl.once('close', () => resolve(false));
    rl.question(question, (answer) => {
      resolve(isConsent(answer));
      rl.close();
    });
  });
}

export function isConsent(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}
