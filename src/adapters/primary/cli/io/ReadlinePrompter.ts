import { createInterface, type Interface } from 'readline/promises';
import { PromptInterruptedError, type IOutput, type IPrompter } from './types';

/**
 * IPrompter over readline/promises
 *
 * Ctrl-C inside readline, a SIGINT forwarded through interrupt() and the
 * input stream closing all abort the pending question, which then rejects
 * with PromptInterruptedError.
 */
export class ReadlinePrompter implements IPrompter {
  private readonly readline: Interface;
  private readonly abortController = new AbortController();

  public constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.readline = createInterface({ input, output });
    this.readline.on('SIGINT', () => this.interrupt());
    this.readline.on('close', () => this.interrupt());
  }

  public async ask(question: string): Promise<string> {
    if (this.abortController.signal.aborted) {
      throw new PromptInterruptedError();
    }
    try {
      return await this.readline.question(question, { signal: this.abortController.signal });
    } catch (error) {
      if (this.abortController.signal.aborted) {
        throw new PromptInterruptedError();
      }
      throw error;
    }
  }

  public interrupt(): void {
    if (!this.abortController.signal.aborted) {
      this.abortController.abort();
    }
  }

  public close(): void {
    this.readline.close();
  }
}

/**
 * IOutput writing to a stream, stdout by default
 */
export class StreamOutput implements IOutput {
  public constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  public writeLine(line = ''): void {
    this.stream.write(`${line}\n`);
  }
}
