/**
 * Line-oriented prompt the CLI reads answers from
 */
export interface IPrompter {
  /**
   * @throws PromptInterruptedError on Ctrl-C or end of input
   */
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Sink for rendered lines
 */
export interface IOutput {
  writeLine(line?: string): void;
}

/**
 * Raised by a prompter when the user interrupts input (Ctrl-C) or input
 * ends; the CLI answers with a farewell and a clean exit
 */
export class PromptInterruptedError extends Error {
  public constructor() {
    super('Prompt interrupted');
    this.name = 'PromptInterruptedError';
    Error.captureStackTrace(this, this.constructor);
  }
}
