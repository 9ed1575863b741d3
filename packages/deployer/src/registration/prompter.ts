import { createInterface, type Interface } from "node:readline/promises";

export interface Prompter {
  ask(question: string, defaultValue?: string): Promise<string>;
  close(): void;
}

/** Line-based prompts on the terminal; questions go to stderr. */
export class ReadlinePrompter implements Prompter {
  private rl: Interface;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stderr) {
    this.rl = createInterface({ input, output });
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    const suffix = defaultValue ? ` [${defaultValue}]` : "";
    const answer = (await this.rl.question(`${question}${suffix}: `)).trim();
    return answer || defaultValue || "";
  }

  close(): void {
    this.rl.close();
  }
}
