import readline from "node:readline/promises";

/** Out-of-band signal that a human finished logging in inside the browser window. */
export interface OperatorConfirmation {
  waitForConfirmation(prompt: string): Promise<void>;
}

export class StdinOperatorConfirmation implements OperatorConfirmation {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  async waitForConfirmation(prompt: string): Promise<void> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    try {
      await rl.question(`${prompt} `);
    } finally {
      rl.close();
    }
  }
}

/** For runs without a human at the terminal: manual login is never confirmed. */
export class UnattendedOperatorConfirmation implements OperatorConfirmation {
  async waitForConfirmation(prompt: string): Promise<void> {
    throw new Error(`Manual login required but no operator is attached (${prompt})`);
  }
}
